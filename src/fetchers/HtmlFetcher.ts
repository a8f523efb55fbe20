/**
 * HTML Fetcher
 * 단일 GET 요청으로 시세 페이지 HTML 수집
 *
 * 정책:
 * - 재시도 없음 (timeout 1회)
 * - 실패(네트워크 오류, non-2xx, timeout)는 예외 대신 null 반환
 * - 리다이렉트는 fetch 기본 동작에 위임
 */

import type { IHtmlFetcher } from "@/core/interfaces/IHtmlFetcher";
import type { HttpConfig } from "@/core/domain/VendorConfig";
import { FETCH_CONFIG } from "@/config/constants";
import { logger as rootLogger, type Logger } from "@/config/logger";

export class HtmlFetcher implements IHtmlFetcher {
  constructor(private readonly logger: Logger = rootLogger) {}

  async fetch(url: string, http: HttpConfig): Promise<string | null> {
    const timeout = FETCH_CONFIG.TIMEOUT_OVERRIDE_MS ?? http.timeout;
    const startTime = Date.now();

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: http.headers,
        signal: AbortSignal.timeout(timeout),
      });

      if (!response.ok) {
        this.logger.warn(
          { url, status: response.status, statusText: response.statusText },
          "[HtmlFetcher] HTTP 오류 응답",
        );
        await response.body?.cancel();
        return null;
      }

      const body = await response.text();

      this.logger.debug(
        { url, bytes: body.length, duration_ms: Date.now() - startTime },
        "[HtmlFetcher] 수집 완료",
      );

      return body;
    } catch (error) {
      const isTimeout =
        error instanceof Error &&
        (error.name === "TimeoutError" || error.name === "AbortError");

      this.logger.warn(
        {
          url,
          timeout_ms: timeout,
          error: error instanceof Error ? error.message : String(error),
        },
        isTimeout ? "[HtmlFetcher] 요청 시간 초과" : "[HtmlFetcher] 요청 실패",
      );
      return null;
    }
  }
}
