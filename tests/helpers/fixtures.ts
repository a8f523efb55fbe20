/**
 * 테스트 헬퍼 - fixture HTML / 벤더 설정 로드
 */

import * as fs from "fs";
import * as path from "path";
import { ConfigLoader } from "@/config/ConfigLoader";

export const VENDORS_DIR = path.resolve(__dirname, "../../config/vendors");

/**
 * tests/fixtures 아래 HTML 로드
 */
export function loadFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, "..", "fixtures", name), "utf8");
}

/**
 * 저장소의 벤더 YAML을 읽는 로더
 */
export function createVendorLoader(): ConfigLoader {
  return ConfigLoader.fromDirectory(VENDORS_DIR);
}
