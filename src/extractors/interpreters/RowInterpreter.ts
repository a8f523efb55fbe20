/**
 * RowInterpreter
 *
 * 목적: 후보 행 목록 → 정규화된 시세 레코드 목록
 * 패턴: Fold (행 분류 결과를 상태 누산기로 접음)
 *
 * 카테고리 상태:
 * - 초기: 카테고리 없음 (null)
 * - 헤더 행 → 새 카테고리로 전환
 * - 데이터 행 → 현재 카테고리 부여 (없으면 "")
 * - 상태는 interpret() 호출마다 새로 생성
 */

import type { Cheerio, Element } from "cheerio";
import {
  isPublishable,
  type NormalizedPriceRecord,
} from "@/core/domain/PriceRecord";
import type { PriceFormat, SourceConfig } from "@/core/domain/VendorConfig";
import { PriceParser } from "@/extractors/common/PriceParser";
import {
  RowClassifier,
  type RowClassification,
  type RowFields,
} from "./RowClassifier";

/**
 * fold 누산기 (interpret() 호출마다 새로 생성)
 */
interface InterpretState {
  category: string | null;
  readonly records: NormalizedPriceRecord[];
}

export class RowInterpreter {
  private readonly classifier: RowClassifier;

  constructor(
    private readonly source: SourceConfig,
    private readonly priceFormat: PriceFormat,
  ) {
    this.classifier = new RowClassifier(source);
  }

  /**
   * 행 분류 (지연 시퀀스)
   */
  *classifyRows(
    rows: Iterable<Cheerio<Element>>,
  ): Generator<RowClassification> {
    for (const row of rows) {
      yield this.classifier.classify(row);
    }
  }

  /**
   * 행 목록 해석
   *
   * @returns 문서 순서의 레코드 목록 (불완전 행은 제외)
   */
  interpret(rows: Iterable<Cheerio<Element>>): NormalizedPriceRecord[] {
    const state: InterpretState = { category: null, records: [] };

    for (const classification of this.classifyRows(rows)) {
      this.step(state, classification);
    }

    return state.records;
  }

  /**
   * 상태 전이 1회
   */
  private step(
    state: InterpretState,
    classification: RowClassification,
  ): void {
    switch (classification.kind) {
      case "header":
        state.category = classification.category;
        return;
      case "noise":
        return;
      case "data": {
        const record = this.buildRecord(classification.fields, state.category);
        if (record) {
          state.records.push(record);
        }
        return;
      }
    }
  }

  /**
   * 레코드 생성
   *
   * @returns 레코드 또는 null (상품명 없음 / 가격 모두 파싱 불가)
   */
  buildRecord(
    fields: RowFields,
    category: string | null,
  ): NormalizedPriceRecord | null {
    const buyPrice = PriceParser.parse(fields.buy, this.priceFormat);
    const sellPrice = PriceParser.parse(fields.sell, this.priceFormat);

    if (!isPublishable(fields.product, buyPrice, sellPrice)) {
      return null;
    }

    return {
      ...(this.source.categoryHeader ? { category: category ?? "" } : {}),
      product: fields.product,
      ...(fields.purity !== undefined ? { purity: fields.purity } : {}),
      unit: fields.unit || this.source.unit,
      buy_price: buyPrice,
      sell_price: sellPrice,
    };
  }
}
