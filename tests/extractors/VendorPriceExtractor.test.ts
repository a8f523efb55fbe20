/**
 * VendorPriceExtractor Test
 *
 * 목적: fixture HTML 기반 벤더별 추출 파이프라인 검증
 */

import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import type { IHtmlFetcher } from "@/core/interfaces/IHtmlFetcher";
import type { HttpConfig } from "@/core/domain/VendorConfig";
import { VendorPriceExtractor } from "@/extractors/VendorPriceExtractor";
import { createVendorLoader, loadFixture } from "../helpers/fixtures";

const loader = createVendorLoader();

function createFetcher(html: string | null) {
  return {
    fetch: jest.fn<(url: string, http: HttpConfig) => Promise<string | null>>(
      async () => html,
    ),
  } satisfies IHtmlFetcher;
}

describe("VendorPriceExtractor", () => {
  describe("phuquy", () => {
    let extractor: VendorPriceExtractor;

    beforeEach(() => {
      extractor = new VendorPriceExtractor(loader.loadConfig("phuquy"));
    });

    it("금: class 기반 매입/매도가를 정수로 추출해야 함", () => {
      const records = extractor.parse("gold", loadFixture("phuquy-gold.html"));

      expect(records).toEqual([
        {
          product: "Vàng miếng SJC",
          unit: "VNĐ/Chỉ",
          buy_price: 8350000,
          sell_price: 8550000,
        },
        {
          product: "Nhẫn tròn Phú Quý 999.9",
          unit: "VNĐ/Chỉ",
          buy_price: 8210000,
          sell_price: 8360000,
        },
        {
          product: "Vàng trang sức 999",
          unit: "VNĐ/Chỉ",
          buy_price: null,
          sell_price: 8150000,
        },
      ]);
    });

    it("은: 카테고리와 행별 단위를 포함해야 함", () => {
      const records = extractor.parse(
        "silver",
        loadFixture("phuquy-silver.html"),
      );

      expect(records).toEqual([
        {
          category: "Bạc miếng",
          product: "Bạc miếng Phú Quý 999 1 lượng",
          unit: "Vnđ/Lượng",
          buy_price: 2150000,
          sell_price: 2216000,
        },
        {
          category: "Bạc miếng",
          product: "Bạc miếng Phú Quý 999 5 lượng",
          unit: "Vnđ/5 Lượng",
          buy_price: 10750000,
          sell_price: 11080000,
        },
        {
          category: "Bạc thỏi",
          product: "Bạc thỏi Phú Quý 999 1 kilo",
          unit: "Vnđ/Kg",
          buy_price: 57333000,
          sell_price: 59093000,
        },
      ]);
    });
  });

  describe("btmc", () => {
    let extractor: VendorPriceExtractor;

    beforeEach(() => {
      extractor = new VendorPriceExtractor(loader.loadConfig("btmc"));
    });

    it("금: 유효 3행 + 노이즈 2행 → 문서 순서대로 3개", () => {
      const records = extractor.parse("gold", loadFixture("btmc-gold.html"));

      expect(records).toEqual([
        {
          product: "SJC 1L",
          purity: "999.9",
          unit: "Nghìn VNĐ/Chỉ",
          buy_price: 78500,
          sell_price: 79200,
        },
        {
          product: "Nhẫn tròn trơn",
          purity: "999.9",
          unit: "Nghìn VNĐ/Chỉ",
          buy_price: 7650,
          sell_price: 7790,
        },
        {
          product: "Vàng BTMC 24K",
          purity: "99.9",
          unit: "Nghìn VNĐ/Chỉ",
          buy_price: 7520.5,
          sell_price: null,
        },
      ]);
    });

    it("은: 소수 가격을 유지하고 상품명 없는 행은 제외해야 함", () => {
      const records = extractor.parse("silver", loadFixture("btmc-silver.html"));

      expect(records).toEqual([
        {
          product: "Bạc thỏi BTMC 999 1kg",
          unit: "Nghìn VNĐ/Lượng",
          buy_price: 51306.539,
          sell_price: 52893.5,
        },
        {
          product: "Bạc miếng 999 1 lượng",
          unit: "Nghìn VNĐ/Lượng",
          buy_price: 1780,
          sell_price: 1835,
        },
      ]);
    });
  });

  describe("extract - 수집 포함", () => {
    it("설정 URL과 HTTP 설정으로 수집해야 함", async () => {
      const config = loader.loadConfig("btmc");
      const fetcher = createFetcher(loadFixture("btmc-gold.html"));
      const extractor = new VendorPriceExtractor(config, fetcher);

      const records = await extractor.extract("gold");

      expect(fetcher.fetch).toHaveBeenCalledTimes(1);
      expect(fetcher.fetch).toHaveBeenCalledWith(
        config.sources.gold.url,
        config.http,
      );
      expect(records).toHaveLength(3);
    });

    it("수집 실패(null)는 에러 없이 빈 배열", async () => {
      const extractor = new VendorPriceExtractor(
        loader.loadConfig("phuquy"),
        createFetcher(null),
      );

      await expect(extractor.extract("silver")).resolves.toEqual([]);
    });

    it("테이블 없는 본문도 빈 배열", async () => {
      const extractor = new VendorPriceExtractor(
        loader.loadConfig("phuquy"),
        createFetcher("<html><body>Bảo trì</body></html>"),
      );

      await expect(extractor.extract("gold")).resolves.toEqual([]);
    });
  });

  it("getSourceUrl은 품목별 설정 URL을 반환해야 함", () => {
    const extractor = new VendorPriceExtractor(loader.loadConfig("phuquy"));

    expect(extractor.getSourceUrl("gold")).toBe("http://giavang.phuquygroup.vn");
    expect(extractor.getSourceUrl("silver")).toBe(
      "http://giabac.phuquygroup.vn",
    );
  });
});
