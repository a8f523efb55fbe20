/**
 * PriceRecord - 정규화된 시세 레코드
 *
 * 벤더별 HTML 테이블에서 추출한 행을 하나의 공통 스키마로 표현
 * - JSON 응답 필드명 그대로 사용 (snake_case)
 * - 가격 부재는 null (0과 구분)
 */

/**
 * 지원 품목
 */
export const COMMODITIES = ["gold", "silver"] as const;

export type Commodity = (typeof COMMODITIES)[number];

/**
 * 정규화된 시세 레코드
 */
export interface NormalizedPriceRecord {
  /** 카테고리 (헤더 행으로 그룹화된 테이블에서만 존재, 헤더 이전은 "") */
  category?: string;

  /** 상품명 (비어있지 않음) */
  product: string;

  /** 순도/함량 표기 (벤더가 제공하는 경우만) */
  purity?: string;

  /** 가격 단위 (예: "VNĐ/Chỉ") */
  unit: string;

  /** 매입가 */
  buy_price: number | null;

  /** 매도가 */
  sell_price: number | null;
}

/**
 * 레코드 발행 조건
 *
 * 상품명이 있고 매입/매도 가격 중 하나 이상 존재
 */
export function isPublishable(
  product: string,
  buyPrice: number | null,
  sellPrice: number | null,
): boolean {
  return product.length > 0 && (buyPrice !== null || sellPrice !== null);
}
