/**
 * VendorPriceExtractor
 *
 * 목적: 벤더 1곳의 시세 추출 파이프라인 (Facade Pattern)
 * 흐름: HtmlFetcher → TableLocator → RowInterpreter
 *
 * - parse()는 순수 함수 (I/O 없음)
 * - 수집 실패(null)는 빈 레코드 목록으로 귀결
 */

import type { IHtmlFetcher } from "@/core/interfaces/IHtmlFetcher";
import type {
  Commodity,
  NormalizedPriceRecord,
} from "@/core/domain/PriceRecord";
import type { VendorConfig } from "@/core/domain/VendorConfig";
import { HtmlFetcher } from "@/fetchers/HtmlFetcher";
import { TableLocator } from "@/extractors/locators/TableLocator";
import { RowInterpreter } from "@/extractors/interpreters/RowInterpreter";
import { createExtractionLogger } from "@/utils/LoggerContext";

export class VendorPriceExtractor {
  constructor(
    readonly config: VendorConfig,
    private readonly fetcher: IHtmlFetcher = new HtmlFetcher(),
  ) {}

  get vendor(): string {
    return this.config.vendor;
  }

  /**
   * 품목별 원본 URL
   */
  getSourceUrl(commodity: Commodity): string {
    return this.config.sources[commodity].url;
  }

  /**
   * 수집 + 파싱
   */
  async extract(commodity: Commodity): Promise<NormalizedPriceRecord[]> {
    const logger = createExtractionLogger(this.vendor, commodity);
    const url = this.getSourceUrl(commodity);

    const html = await this.fetcher.fetch(url, this.config.http);
    const records = this.parse(commodity, html);

    logger.info(
      { url, fetched: html !== null, record_count: records.length },
      "[VendorPriceExtractor] 추출 완료",
    );

    return records;
  }

  /**
   * HTML → 레코드 (순수)
   *
   * @param html 원본 HTML 또는 null (수집 실패)
   */
  parse(commodity: Commodity, html: string | null): NormalizedPriceRecord[] {
    const source = this.config.sources[commodity];
    const rows = TableLocator.locate(html, source.locator);

    return new RowInterpreter(source, this.config.priceFormat).interpret(rows);
  }
}
