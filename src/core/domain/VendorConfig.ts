/**
 * VendorConfig - 벤더 YAML 설정 스키마
 *
 * SOLID 원칙:
 * - SRP: 벤더 설정 스키마 정의만 담당
 * - OCP: 새 벤더/레이아웃은 YAML과 mapping 항목 추가로 확장
 */

import { z } from "zod";

/**
 * 가격 숫자 도메인
 * - integer: 통화 최소 단위 정수 (예: 3,848,000 VND)
 * - decimal: 소수 허용 (예: 51306.539)
 */
export const PriceFormatSchema = z.enum(["integer", "decimal"]);

export type PriceFormat = z.infer<typeof PriceFormatSchema>;

/**
 * 테이블 행 탐색 전략
 * - tbody-rows: table > tbody 아래 행만
 * - table-rows: 모든 table의 모든 행 (thead 포함)
 */
export const LocatorStrategySchema = z.enum(["tbody-rows", "table-rows"]);

export type LocatorStrategy = z.infer<typeof LocatorStrategySchema>;

/**
 * 속성 기반 셀 참조 (selector에 매칭되는 nth번째 셀)
 */
export const CellRefSchema = z.object({
  selector: z.string().min(1),
  nth: z.number().int().min(0).default(0),
});

export type CellRef = z.infer<typeof CellRefSchema>;

const FieldNameSchema = z.enum(["product", "purity", "unit", "buy", "sell"]);

export type FieldName = z.infer<typeof FieldNameSchema>;

/**
 * 위치 기반 컬럼 매핑 (셀 인덱스)
 */
export const PositionalMappingSchema = z.object({
  kind: z.literal("positional"),
  minCells: z.number().int().min(1),
  columns: z.object({
    product: z.number().int().min(0),
    purity: z.number().int().min(0).optional(),
    unit: z.number().int().min(0).optional(),
    buy: z.number().int().min(0),
    sell: z.number().int().min(0),
  }),
});

export type PositionalMapping = z.infer<typeof PositionalMappingSchema>;

/**
 * 속성(CSS class) 기반 컬럼 매핑
 *
 * required에 포함된 셀이 없으면 해당 행은 노이즈로 처리
 */
export const AttributeMappingSchema = z.object({
  kind: z.literal("attribute"),
  minCells: z.number().int().min(0).default(0),
  cells: z.object({
    product: CellRefSchema,
    purity: CellRefSchema.optional(),
    unit: CellRefSchema.optional(),
    buy: CellRefSchema,
    sell: CellRefSchema,
  }),
  required: z.array(FieldNameSchema).default(["product"]),
});

export type AttributeMapping = z.infer<typeof AttributeMappingSchema>;

export const ColumnMappingSchema = z.discriminatedUnion("kind", [
  PositionalMappingSchema,
  AttributeMappingSchema,
]);

export type ColumnMapping = z.infer<typeof ColumnMappingSchema>;

/**
 * 품목별 소스 설정 (URL + 테이블 레이아웃)
 */
export const SourceConfigSchema = z.object({
  url: z.string().url(),
  locator: LocatorStrategySchema,
  unit: z.string().default(""),
  categoryHeader: z.string().min(1).optional(),
  mappings: z.array(ColumnMappingSchema).min(1),
});

export type SourceConfig = z.infer<typeof SourceConfigSchema>;

/**
 * HTTP 요청 설정
 */
export const HttpConfigSchema = z.object({
  headers: z.record(z.string()).default({}),
  timeout: z.number().int().positive().default(10000),
});

export type HttpConfig = z.infer<typeof HttpConfigSchema>;

/**
 * 벤더 설정 (YAML 루트)
 */
export const VendorConfigSchema = z.object({
  vendor: z.string().min(1),
  name: z.string().min(1),
  priceFormat: PriceFormatSchema,
  http: HttpConfigSchema,
  sources: z.object({
    gold: SourceConfigSchema,
    silver: SourceConfigSchema,
  }),
});

export type VendorConfig = z.infer<typeof VendorConfigSchema>;
