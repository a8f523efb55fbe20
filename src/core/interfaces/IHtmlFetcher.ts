/**
 * HTML Fetcher 인터페이스
 *
 * SOLID 원칙:
 * - DIP: Extractor는 구체 HTTP 구현이 아닌 이 인터페이스에 의존
 */

import type { HttpConfig } from "@/core/domain/VendorConfig";

export interface IHtmlFetcher {
  /**
   * 페이지 HTML 수집
   *
   * @param url 대상 URL
   * @param http 요청 헤더 / timeout
   * @returns 응답 본문 또는 null (네트워크 오류, non-2xx, timeout)
   */
  fetch(url: string, http: HttpConfig): Promise<string | null>;
}
