/**
 * PriceService
 *
 * 추출 결과를 API 응답 봉투(timestamp + source)로 감싸는 서비스
 *
 * SOLID 원칙:
 * - SRP: 응답 조립만 담당 (추출은 VendorPriceExtractor 위임)
 * - DIP: ExtractorRegistry 주입
 */

import type {
  Commodity,
  NormalizedPriceRecord,
} from "@/core/domain/PriceRecord";
import { ExtractorRegistry } from "@/extractors/ExtractorRegistry";
import { getTimestampWithTimezone } from "@/utils/timestamp";

/**
 * 전체 시세 응답
 */
export interface AllPricesResponse {
  timestamp: string;
  vendor: string;
  sources: Record<Commodity, string>;
  gold: NormalizedPriceRecord[];
  silver: NormalizedPriceRecord[];
}

/**
 * 품목별 시세 응답 (gold 또는 silver 키 하나만 존재)
 */
export type CommodityPricesResponse = {
  timestamp: string;
  vendor: string;
  source: string;
} & Partial<Record<Commodity, NormalizedPriceRecord[]>>;

/**
 * 벤더 요약 정보
 */
export interface VendorSummary {
  id: string;
  name: string;
  sources: Record<Commodity, string>;
}

export interface IPriceService {
  hasVendor(vendor: string): boolean;
  listVendors(): VendorSummary[];
  getAllPrices(vendor: string): Promise<AllPricesResponse>;
  getPrices(
    vendor: string,
    commodity: Commodity,
  ): Promise<CommodityPricesResponse>;
}

export class PriceService implements IPriceService {
  constructor(
    private readonly registry: ExtractorRegistry = ExtractorRegistry.getInstance(),
    private readonly now: () => Date = () => new Date(),
  ) {}

  hasVendor(vendor: string): boolean {
    return this.registry.has(vendor);
  }

  listVendors(): VendorSummary[] {
    return this.registry.list().map((vendor) => {
      const extractor = this.registry.get(vendor);
      return {
        id: vendor,
        name: extractor.config.name,
        sources: {
          gold: extractor.getSourceUrl("gold"),
          silver: extractor.getSourceUrl("silver"),
        },
      };
    });
  }

  /**
   * 금/은 동시 추출 (서로 독립적인 리소스)
   */
  async getAllPrices(vendor: string): Promise<AllPricesResponse> {
    const extractor = this.registry.get(vendor);
    const timestamp = getTimestampWithTimezone(this.now());

    const [gold, silver] = await Promise.all([
      extractor.extract("gold"),
      extractor.extract("silver"),
    ]);

    return {
      timestamp,
      vendor,
      sources: {
        gold: extractor.getSourceUrl("gold"),
        silver: extractor.getSourceUrl("silver"),
      },
      gold,
      silver,
    };
  }

  async getPrices(
    vendor: string,
    commodity: Commodity,
  ): Promise<CommodityPricesResponse> {
    const extractor = this.registry.get(vendor);
    const timestamp = getTimestampWithTimezone(this.now());
    const records = await extractor.extract(commodity);

    const response: CommodityPricesResponse = {
      timestamp,
      vendor,
      source: extractor.getSourceUrl(commodity),
    };
    response[commodity] = records;

    return response;
  }
}
