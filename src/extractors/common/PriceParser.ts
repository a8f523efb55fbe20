/**
 * PriceParser Utility
 *
 * 목적: 가격 텍스트 파싱 유틸리티
 * 패턴: Utility Class (Static Methods)
 */

import type { PriceFormat } from "@/core/domain/VendorConfig";

/**
 * 가격 파서 유틸리티
 *
 * 쉼표 천 단위 구분 가격 형식을 처리하는 정적 메서드 제공
 * - 파싱 불가(빈 값, "Liên hệ" 등 문의 문구)는 null 반환 (0과 구분)
 * - 정수 도메인과 소수 도메인을 분리 (벤더별 숫자 형식이 다름)
 */
export class PriceParser {
  /**
   * 공백 제거 + 천 단위 구분자(쉼표) 제거
   *
   * " 3,848,000 " → "3848000"
   */
  static clean(text: string | null | undefined): string {
    if (!text || typeof text !== "string") {
      return "";
    }

    return text.trim().replace(/,/g, "");
  }

  /**
   * 정수 가격 파싱
   *
   * "1,234,567" → 1234567
   * "Liên hệ" → null
   * "15,000.5" → null (소수점 불허)
   */
  static parseInteger(text: string | null | undefined): number | null {
    const cleaned = this.clean(text);
    if (!/^\d+$/.test(cleaned)) {
      return null;
    }

    return parseInt(cleaned, 10);
  }

  /**
   * 소수 가격 파싱
   *
   * 숫자와 소수점 1개만 허용
   * "17,800" → 17800
   * "51306.539" → 51306.539
   * "1.2.3" → null
   */
  static parseDecimal(text: string | null | undefined): number | null {
    const cleaned = this.clean(text);
    if (!/^(?:\d+(?:\.\d*)?|\.\d+)$/.test(cleaned)) {
      return null;
    }

    return parseFloat(cleaned);
  }

  /**
   * 벤더 숫자 도메인에 따른 파싱
   */
  static parse(
    text: string | null | undefined,
    format: PriceFormat,
  ): number | null {
    switch (format) {
      case "integer":
        return this.parseInteger(text);
      case "decimal":
        return this.parseDecimal(text);
    }
  }
}
