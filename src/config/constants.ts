/**
 * 애플리케이션 설정 상수
 *
 * 환경변수 기반 설정 관리
 * - 환경변수가 없으면 기본값 사용
 * - 타입 안전성 보장
 */

import path from "path";

/**
 * 애플리케이션 메타데이터
 *
 * ⚠️ package.json의 "version"과 수동 동기화 필요
 */
export const APP_METADATA = {
  VERSION: "1.0.0",

  NAME: "Gold & Silver Price Scraper API",
} as const;

/**
 * 서버 설정
 */
export const SERVER_CONFIG = {
  /**
   * 리스닝 포트
   * 환경변수: PORT
   * 기본값: 3000
   */
  PORT: Number(process.env.PORT) || 3000,

  /**
   * 쿼리에 vendor가 없을 때 사용하는 벤더
   * 환경변수: DEFAULT_VENDOR
   * 기본값: "phuquy"
   */
  DEFAULT_VENDOR: process.env.DEFAULT_VENDOR || "phuquy",
} as const;

/**
 * 경로 설정
 */
export const PATH_CONFIG = {
  /**
   * 벤더 YAML 디렉토리
   * 환경변수: VENDOR_CONFIG_DIR
   * 기본값: <cwd>/config/vendors
   */
  VENDORS_DIR:
    process.env.VENDOR_CONFIG_DIR ||
    path.join(process.cwd(), "config", "vendors"),
} as const;

/**
 * 수집(fetch) 설정
 */
export const FETCH_CONFIG = {
  /**
   * YAML timeout 덮어쓰기 (ms)
   * 환경변수: FETCH_TIMEOUT_MS
   * 미설정 시 벤더 YAML 값 사용
   */
  TIMEOUT_OVERRIDE_MS: Number(process.env.FETCH_TIMEOUT_MS) || undefined,
} as const;

/**
 * 서비스 이름 (로그 컨텍스트용)
 */
export const SERVICE_NAMES = {
  SERVER: "server",
} as const;
