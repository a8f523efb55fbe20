/**
 * YAML 설정 로더
 * Singleton Pattern 적용
 *
 * SOLID 원칙:
 * - SRP: YAML 파일 로드/검증만 담당
 * - OCP: 새로운 벤더 추가 시 YAML만 추가
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { VendorConfigSchema, type VendorConfig } from "@/core/domain/VendorConfig";
import { PATH_CONFIG } from "./constants";

/**
 * Config Loader Singleton
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private configCache: Map<string, VendorConfig> = new Map();

  private constructor(private readonly vendorsDir: string) {}

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader(PATH_CONFIG.VENDORS_DIR);
    }
    return ConfigLoader.instance;
  }

  /**
   * 특정 디렉토리 기준 로더 생성 (테스트용)
   */
  static fromDirectory(vendorsDir: string): ConfigLoader {
    return new ConfigLoader(vendorsDir);
  }

  /**
   * YAML 설정 파일 로드
   *
   * @throws {Error} 파일 없음 또는 스키마 위반
   */
  loadConfig(vendor: string): VendorConfig {
    const cached = this.configCache.get(vendor);
    if (cached) {
      return cached;
    }

    const configPath = path.join(this.vendorsDir, `${vendor}.yaml`);

    if (!fs.existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }

    const fileContent = fs.readFileSync(configPath, "utf8");
    const config = this.validateConfig(yaml.load(fileContent), configPath);

    if (config.vendor !== vendor) {
      throw new Error(
        `Vendor id mismatch in ${configPath}: expected "${vendor}", got "${config.vendor}"`,
      );
    }

    this.configCache.set(vendor, config);

    return config;
  }

  /**
   * 설정 유효성 검증 (zod)
   */
  private validateConfig(raw: unknown, configPath: string): VendorConfig {
    const result = VendorConfigSchema.safeParse(raw);

    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new Error(`Invalid vendor config ${configPath}: ${issues}`);
    }

    return result.data;
  }

  /**
   * 사용 가능한 벤더 목록 반환
   * @returns 벤더 ID 배열 (파일명 정렬순)
   */
  getAvailableVendors(): string[] {
    if (!fs.existsSync(this.vendorsDir)) {
      // 디렉토리 없음은 설정 오류이므로 throw
      throw new Error(`Vendors directory not found: ${this.vendorsDir}`);
    }

    const vendors = fs
      .readdirSync(this.vendorsDir)
      .filter((file) => file.endsWith(".yaml"))
      .map((file) => file.replace(/\.yaml$/, ""))
      .sort();

    if (vendors.length === 0) {
      throw new Error(`No vendor YAML files found in: ${this.vendorsDir}`);
    }

    return vendors;
  }
}
