/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 * Request ID, 벤더/품목 추적 지원
 */

import { logger, Logger } from "@/config/logger";

/**
 * 서비스 전용 로거 생성
 * @param serviceName - 서비스 이름 (예: "server")
 */
export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service_name: serviceName });
}

/**
 * Request 전용 로거 생성
 * @param requestId - Request ID (UUID)
 * @param method - HTTP method
 * @param path - 요청 경로
 * @returns Request 컨텍스트가 포함된 자식 로거
 */
export function createRequestLogger(
  requestId: string,
  method: string,
  path: string,
): Logger {
  return logger.child({
    request_id: requestId,
    method,
    path,
  });
}

/**
 * 추출 작업 전용 로거 생성
 * @param vendor - 벤더 ID (예: "phuquy")
 * @param commodity - 품목 ("gold" | "silver")
 */
export function createExtractionLogger(
  vendor: string,
  commodity: string,
): Logger {
  return logger.child({ vendor, commodity });
}

/**
 * 중요 정보 로깅 (콘솔에 ⭐ 표시)
 * @param logger - 로거 인스턴스
 * @param message - 로그 메시지
 * @param data - 추가 데이터
 */
export function logImportant(
  logger: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  logger.info({ ...data, important: true }, message);
}
