/**
 * DOMHelper Utility
 *
 * 목적: cheerio 테이블 행(tr) 안전 접근 유틸리티
 * 패턴: Utility Class (Static Methods)
 */

import type { Cheerio, Element } from "cheerio";
import type { CellRef } from "@/core/domain/VendorConfig";

/**
 * DOM 헬퍼 유틸리티
 *
 * 테이블 행에서 셀 텍스트를 안전하게 꺼내는 정적 메서드 제공
 * - 셀이 없으면 null 반환 (빈 문자열 셀과 구분)
 * - 텍스트는 공백 정규화 후 trim
 */
export class DOMHelper {
  /**
   * 공백 정규화 (연속 공백/개행 → 공백 1개, 앞뒤 trim)
   */
  static normalizeText(text: string): string {
    return text.replace(/\s+/g, " ").trim();
  }

  /**
   * 행의 td 셀 목록
   */
  static cells(row: Cheerio<Element>): Cheerio<Element> {
    return row.find("td");
  }

  /**
   * 행의 td 셀 개수
   */
  static cellCount(row: Cheerio<Element>): number {
    return this.cells(row).length;
  }

  /**
   * 인덱스 위치 셀 텍스트
   *
   * @returns 셀 텍스트 또는 null (셀 없음)
   */
  static textAt(row: Cheerio<Element>, index: number): string | null {
    const cell = this.cells(row).eq(index);
    return cell.length > 0 ? this.normalizeText(cell.text()) : null;
  }

  /**
   * selector에 매칭되는 nth번째 요소 텍스트
   *
   * @returns 요소 텍스트 또는 null (요소 없음)
   */
  static textOf(row: Cheerio<Element>, ref: CellRef): string | null {
    const cell = row.find(ref.selector).eq(ref.nth);
    return cell.length > 0 ? this.normalizeText(cell.text()) : null;
  }
}
