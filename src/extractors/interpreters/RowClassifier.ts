/**
 * RowClassifier
 *
 * 목적: 테이블 행을 헤더 / 데이터 / 노이즈로 분류
 * 패턴: Strategy Pattern (ColumnMapping 테이블 기반 컬럼 매핑)
 *
 * 셀 개수에 따라 매핑을 고르는 규칙:
 * - mappings를 설정 순서대로 검사하여 셀 개수가 minCells 이상인 첫 매핑 적용
 * - 어떤 매핑에도 못 미치면 노이즈 (새 레이아웃일 가능성이 있어도 건너뜀)
 */

import type { Cheerio, Element } from "cheerio";
import type {
  AttributeMapping,
  ColumnMapping,
  FieldName,
  PositionalMapping,
  SourceConfig,
} from "@/core/domain/VendorConfig";
import { DOMHelper } from "@/extractors/common/DOMHelper";

/**
 * 데이터 행에서 읽은 원본 텍스트 (가격 파싱 전)
 */
export interface RowFields {
  product: string;
  purity?: string;
  unit?: string;
  buy: string | null;
  sell: string | null;
}

export type NoiseReason = "too_few_cells" | "missing_cell";

export type RowClassification =
  | { kind: "header"; category: string }
  | { kind: "data"; fields: RowFields }
  | { kind: "noise"; reason: NoiseReason };

export class RowClassifier {
  constructor(private readonly source: SourceConfig) {}

  /**
   * 행 분류
   */
  classify(row: Cheerio<Element>): RowClassification {
    const header = this.detectHeader(row);
    if (header !== null) {
      return { kind: "header", category: header };
    }

    const mapping = RowClassifier.selectMapping(
      this.source.mappings,
      DOMHelper.cellCount(row),
    );
    if (!mapping) {
      return { kind: "noise", reason: "too_few_cells" };
    }

    return mapping.kind === "positional"
      ? this.readPositional(row, mapping)
      : this.readAttribute(row, mapping);
  }

  /**
   * 셀 개수에 맞는 첫 매핑 선택
   */
  static selectMapping(
    mappings: readonly ColumnMapping[],
    cellCount: number,
  ): ColumnMapping | undefined {
    return mappings.find((mapping) => cellCount >= mapping.minCells);
  }

  /**
   * 카테고리 헤더 행 감지
   *
   * @returns 헤더 텍스트 또는 null (헤더 아님)
   */
  private detectHeader(row: Cheerio<Element>): string | null {
    if (!this.source.categoryHeader) {
      return null;
    }

    const header = row.find(this.source.categoryHeader).first();
    return header.length > 0 ? DOMHelper.normalizeText(header.text()) : null;
  }

  /**
   * 위치 기반 매핑 읽기
   */
  private readPositional(
    row: Cheerio<Element>,
    mapping: PositionalMapping,
  ): RowClassification {
    const { columns } = mapping;
    const product = DOMHelper.textAt(row, columns.product);
    if (product === null) {
      return { kind: "noise", reason: "missing_cell" };
    }

    const fields: RowFields = {
      product,
      buy: DOMHelper.textAt(row, columns.buy),
      sell: DOMHelper.textAt(row, columns.sell),
    };

    if (columns.purity !== undefined) {
      fields.purity = DOMHelper.textAt(row, columns.purity) ?? undefined;
    }
    if (columns.unit !== undefined) {
      fields.unit = DOMHelper.textAt(row, columns.unit) ?? undefined;
    }

    return { kind: "data", fields };
  }

  /**
   * 속성(CSS class) 기반 매핑 읽기
   */
  private readAttribute(
    row: Cheerio<Element>,
    mapping: AttributeMapping,
  ): RowClassification {
    const { cells } = mapping;
    const texts: Record<FieldName, string | null> = {
      product: DOMHelper.textOf(row, cells.product),
      purity: cells.purity ? DOMHelper.textOf(row, cells.purity) : null,
      unit: cells.unit ? DOMHelper.textOf(row, cells.unit) : null,
      buy: DOMHelper.textOf(row, cells.buy),
      sell: DOMHelper.textOf(row, cells.sell),
    };

    if (mapping.required.some((field) => texts[field] === null)) {
      return { kind: "noise", reason: "missing_cell" };
    }
    if (texts.product === null) {
      return { kind: "noise", reason: "missing_cell" };
    }

    const fields: RowFields = {
      product: texts.product,
      buy: texts.buy,
      sell: texts.sell,
    };

    if (texts.purity !== null) {
      fields.purity = texts.purity;
    }
    if (texts.unit !== null) {
      fields.unit = texts.unit;
    }

    return { kind: "data", fields };
  }
}
