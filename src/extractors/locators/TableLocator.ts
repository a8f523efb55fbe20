/**
 * TableLocator
 *
 * 목적: HTML 문서에서 시세 데이터 후보 행(tr) 선택
 * 패턴: Strategy Pattern (벤더 마크업별 행 선택 전략)
 *
 * 구조적 선택만 수행하며 의미 필터링은 RowInterpreter 담당
 */

import { load, type Cheerio, type Element } from "cheerio";
import type { LocatorStrategy } from "@/core/domain/VendorConfig";

/**
 * 전략별 행 selector
 * - tbody-rows: 본문(tbody) 행만 (thead 헤더 제외)
 * - table-rows: 모든 테이블의 모든 행
 */
const ROW_SELECTORS: Record<LocatorStrategy, string> = {
  "tbody-rows": "table tbody tr",
  "table-rows": "table tr",
};

export class TableLocator {
  /**
   * 후보 행 목록 반환 (문서 순서)
   *
   * @param html 원본 HTML (수집 실패 시 null)
   * @param strategy 행 선택 전략
   * @returns 행 목록 (HTML 없음 → 빈 배열)
   */
  static locate(
    html: string | null,
    strategy: LocatorStrategy,
  ): Cheerio<Element>[] {
    if (!html) {
      return [];
    }

    const $ = load(html);
    return $.root()
      .find(ROW_SELECTORS[strategy])
      .toArray()
      .map((row) => $(row));
  }
}
