/**
 * ExtractorRegistry
 *
 * 목적: 벤더별 Extractor 중앙 관리 Registry
 * 패턴: Singleton Pattern, Registry Pattern
 */

import { ConfigLoader } from "@/config/ConfigLoader";
import { VendorPriceExtractor } from "./VendorPriceExtractor";

/**
 * Extractor 중앙 관리 Registry (Singleton)
 *
 * 전략:
 * - 최초 조회 시 ConfigLoader의 벤더 YAML 전체를 등록
 * - 테스트는 clear() 후 register()로 대체 Extractor 주입
 */
export class ExtractorRegistry {
  private static instance: ExtractorRegistry;
  private readonly extractors = new Map<string, VendorPriceExtractor>();

  private constructor() {}

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ExtractorRegistry {
    if (!ExtractorRegistry.instance) {
      ExtractorRegistry.instance = new ExtractorRegistry();
      ExtractorRegistry.instance.registerDefaults(ConfigLoader.getInstance());
    }
    return ExtractorRegistry.instance;
  }

  /**
   * 설정 디렉토리의 모든 벤더 등록
   */
  registerDefaults(loader: ConfigLoader): void {
    for (const vendor of loader.getAvailableVendors()) {
      this.register(new VendorPriceExtractor(loader.loadConfig(vendor)));
    }
  }

  /**
   * Extractor 등록 (벤더 ID 기준, 기존 항목 덮어씀)
   */
  register(extractor: VendorPriceExtractor): void {
    this.extractors.set(extractor.vendor, extractor);
  }

  /**
   * Extractor 조회
   *
   * @throws {Error} 등록되지 않은 벤더 (등록된 ID 목록 포함)
   */
  get(vendor: string): VendorPriceExtractor {
    const extractor = this.extractors.get(vendor);

    if (!extractor) {
      throw new Error(
        `Extractor not found: ${vendor}. Available: [${this.list().join(", ")}]`,
      );
    }

    return extractor;
  }

  has(vendor: string): boolean {
    return this.extractors.has(vendor);
  }

  /**
   * 등록된 벤더 ID 목록
   */
  list(): string[] {
    return Array.from(this.extractors.keys());
  }

  /**
   * 모든 Extractor 제거 (테스트 격리용)
   */
  clear(): void {
    this.extractors.clear();
  }
}
