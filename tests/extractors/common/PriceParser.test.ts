/**
 * PriceParser Utility Test
 *
 * 목적: 가격 텍스트 파싱 유틸리티 검증
 */

import { describe, it, expect } from "@jest/globals";
import { PriceParser } from "@/extractors/common/PriceParser";

describe("PriceParser", () => {
  describe("clean - 공백/천 단위 구분자 제거", () => {
    it("앞뒤 공백과 쉼표를 제거해야 함", () => {
      expect(PriceParser.clean("  3,848,000 ")).toBe("3848000");
    });

    it("null/undefined는 빈 문자열", () => {
      expect(PriceParser.clean(null)).toBe("");
      expect(PriceParser.clean(undefined)).toBe("");
    });
  });

  describe("parseInteger - 정수 도메인", () => {
    it("쉼표 포함 문자열을 정수로 변환해야 함", () => {
      expect(PriceParser.parseInteger("1,234,567")).toBe(1234567);
    });

    it("쉼표 없는 숫자도 변환해야 함", () => {
      expect(PriceParser.parseInteger("8550000")).toBe(8550000);
    });

    it("0은 null이 아닌 0", () => {
      expect(PriceParser.parseInteger("0")).toBe(0);
    });

    it("문의 문구(Liên hệ)는 null", () => {
      expect(PriceParser.parseInteger("Liên hệ")).toBeNull();
    });

    it("소수점이 있으면 null", () => {
      expect(PriceParser.parseInteger("15,000.5")).toBeNull();
    });

    it("점(.) 천 단위 구분은 숫자로 보지 않음", () => {
      expect(PriceParser.parseInteger("3.848.000")).toBeNull();
    });

    it("빈 문자열/공백/null은 null", () => {
      expect(PriceParser.parseInteger("")).toBeNull();
      expect(PriceParser.parseInteger("   ")).toBeNull();
      expect(PriceParser.parseInteger(null)).toBeNull();
    });

    it("음수 부호나 통화 기호가 섞이면 null", () => {
      expect(PriceParser.parseInteger("-1,000")).toBeNull();
      expect(PriceParser.parseInteger("1,000đ")).toBeNull();
    });
  });

  describe("parseDecimal - 소수 도메인", () => {
    it("쉼표 천 단위 구분 숫자", () => {
      expect(PriceParser.parseDecimal("17,800")).toBe(17800);
    });

    it("구분자 없는 숫자", () => {
      expect(PriceParser.parseDecimal("17800")).toBe(17800);
    });

    it("소수점 1개 허용", () => {
      expect(PriceParser.parseDecimal("51306.539")).toBe(51306.539);
      expect(PriceParser.parseDecimal("7,520.5")).toBe(7520.5);
    });

    it("소수점 2개 이상은 null", () => {
      expect(PriceParser.parseDecimal("1.2.3")).toBeNull();
    });

    it("점만 있으면 null", () => {
      expect(PriceParser.parseDecimal(".")).toBeNull();
    });

    it("문의 문구(Liên hệ)는 null", () => {
      expect(PriceParser.parseDecimal("Liên hệ")).toBeNull();
    });

    it("빈 문자열은 null", () => {
      expect(PriceParser.parseDecimal("")).toBeNull();
    });
  });

  describe("parse - 숫자 도메인 분기", () => {
    it("integer 도메인은 소수를 거부", () => {
      expect(PriceParser.parse("51306.539", "integer")).toBeNull();
    });

    it("decimal 도메인은 소수를 허용", () => {
      expect(PriceParser.parse("51306.539", "decimal")).toBe(51306.539);
    });

    it("두 도메인 모두 쉼표 정수는 같은 값", () => {
      expect(PriceParser.parse("78,500", "integer")).toBe(78500);
      expect(PriceParser.parse("78,500", "decimal")).toBe(78500);
    });
  });
});
