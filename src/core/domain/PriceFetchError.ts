import type { Commodity } from "./PriceRecord";

/**
 * 시세 조회 실패 에러
 *
 * 라우터에서 next()로 넘기면 errorHandler가 500 응답으로 변환
 * - commodity 없음: 전체(금 + 은) 조회 실패
 */
export class PriceFetchError extends Error {
  public readonly vendor: string;
  public readonly commodity: Commodity | null;
  public readonly errorCause?: Error;

  constructor(vendor: string, commodity: Commodity | null, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      commodity
        ? `Error fetching ${commodity} prices: ${reason}`
        : `Error fetching prices: ${reason}`,
    );
    this.name = "PriceFetchError";
    this.vendor = vendor;
    this.commodity = commodity;
    this.errorCause = cause instanceof Error ? cause : undefined;
  }

  /**
   * 로그용 객체 변환
   */
  toLogObject(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      vendor: this.vendor,
      commodity: this.commodity,
      cause: this.errorCause?.message,
      stack: this.errorCause?.stack ?? this.stack,
    };
  }
}
