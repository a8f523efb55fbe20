/**
 * HtmlFetcher 단위 테스트
 * Note: 전역 fetch는 spy로 대체
 */

import {
  describe,
  it,
  expect,
  beforeEach,
  afterEach,
  jest,
} from "@jest/globals";
import pino from "pino";
import { HtmlFetcher } from "@/fetchers/HtmlFetcher";
import type { HttpConfig } from "@/core/domain/VendorConfig";

const HTTP: HttpConfig = {
  timeout: 10000,
  headers: {
    "User-Agent": "test-agent",
    Referer: "https://example.com/",
  },
};

function spyFetch() {
  return jest.spyOn(globalThis, "fetch");
}

describe("HtmlFetcher", () => {
  const logger = pino({ level: "silent" });
  let fetchSpy: ReturnType<typeof spyFetch>;
  let fetcher: HtmlFetcher;

  beforeEach(() => {
    fetchSpy = spyFetch();
    fetcher = new HtmlFetcher(logger);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("2xx 응답이면 본문 텍스트를 반환해야 함", async () => {
    fetchSpy.mockResolvedValue(
      new Response("<table></table>", { status: 200 }),
    );

    await expect(
      fetcher.fetch("https://example.com/gold", HTTP),
    ).resolves.toBe("<table></table>");
  });

  it("설정 헤더와 timeout signal로 GET 요청해야 함", async () => {
    fetchSpy.mockResolvedValue(new Response("ok", { status: 200 }));

    await fetcher.fetch("https://example.com/gold", HTTP);

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("https://example.com/gold");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual(HTTP.headers);
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("non-2xx 응답이면 null을 반환하고 경고를 남겨야 함", async () => {
    const warnSpy = jest.spyOn(logger, "warn");
    fetchSpy.mockResolvedValue(new Response("down", { status: 503 }));

    await expect(
      fetcher.fetch("https://example.com/gold", HTTP),
    ).resolves.toBeNull();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("non-2xx 응답 본문은 읽지 않고 해제해야 함", async () => {
    const response = new Response("<html>maintenance</html>", {
      status: 502,
    });
    fetchSpy.mockResolvedValue(response);

    await fetcher.fetch("https://example.com/gold", HTTP);

    expect(response.bodyUsed).toBe(true);
  });

  it("네트워크 오류는 예외 대신 null", async () => {
    fetchSpy.mockRejectedValue(new TypeError("fetch failed"));

    await expect(
      fetcher.fetch("https://example.com/gold", HTTP),
    ).resolves.toBeNull();
  });

  it("timeout은 예외 대신 null", async () => {
    fetchSpy.mockRejectedValue(
      Object.assign(new Error("The operation was aborted due to timeout"), {
        name: "TimeoutError",
      }),
    );

    await expect(
      fetcher.fetch("https://example.com/gold", HTTP),
    ).resolves.toBeNull();
  });

  it("재시도하지 않아야 함", async () => {
    fetchSpy.mockRejectedValue(new TypeError("fetch failed"));

    await fetcher.fetch("https://example.com/gold", HTTP);

    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });
});
