/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 다중 출력 (콘솔 + 파일)
 * - 일일 로그 로테이션 (날짜별 디렉터리)
 * - 환경별 설정
 * - 구조화된 JSON 로깅
 *
 * 콘솔 출력:
 * - 개발 환경 + LOG_PRETTY=true: 색상 포맷
 * - 그 외: JSON 포맷
 *
 * 파일 출력 (LOG_TO_FILE=false 또는 테스트 환경에서는 비활성화):
 * - logs/YYYY-MM-DD/server.log
 * - logs/YYYY-MM-DD/error.log (에러 통합)
 * - 일일 로테이션, 90일 보관
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import {
  getDateStringWithDash,
  getTimestampWithTimezone,
} from "@/utils/timestamp";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test"
    ? "silent"
    : NODE_ENV === "production"
      ? "info"
      : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = NODE_ENV !== "test" && process.env.LOG_TO_FILE !== "false";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string) {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d", // 일일 로테이션
      intervalBoundary: true, // 자정(00:00) 기준 정렬
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 90, // 90일 보관
      maxSize: "100M",
    },
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * 콘솔 출력에서 제외할 필드
 */
const EXCLUDED_CONSOLE_FIELDS = [
  "level",
  "time",
  "service",
  "env",
  "pid",
  "hostname",
  "msg",
  "important",
];

/**
 * 개발 환경용 콘솔 포맷 (색상 + 구조화)
 */
function formatConsolePretty(logObj: Record<string, unknown>): string {
  const level = String(logObj.level ?? "info");
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level === "error" || level === "fatal"
      ? "\x1b[31m"
      : level === "warn"
        ? "\x1b[33m"
        : "\x1b[32m";
  const star = logObj.important === true ? " ⭐" : "";

  const lines = [
    `[${time}] ${levelColor}${level.toUpperCase()}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`,
  ];

  for (const [field, raw] of Object.entries(logObj)) {
    if (EXCLUDED_CONSOLE_FIELDS.includes(field)) continue;
    const value =
      typeof raw === "object"
        ? JSON.stringify(raw, null, 2)
            .split("\n")
            .map((l) => "  " + l)
            .join("\n")
        : String(raw);
    lines.push(`  ${field}: ${value}`);
  }

  return lines.join("\n") + "\n";
}

/**
 * 콘솔 스트림
 * pretty 모드에서는 JSON 라인을 색상 포맷으로 변환
 */
class ConsoleStream implements DestinationStream {
  constructor(private readonly pretty: boolean) {}

  write(chunk: string): void {
    if (!this.pretty) {
      process.stdout.write(chunk);
      return;
    }

    try {
      const parsed: unknown = JSON.parse(chunk);
      process.stderr.write(
        isRecord(parsed) ? formatConsolePretty(parsed) : chunk,
      );
    } catch {
      // JSON이 아니면 원문 그대로 출력
      process.stderr.write(chunk);
    }
  }
}

/**
 * 기본 로거 설정
 */
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "metal_price_scraper",
    env: NODE_ENV,
  },
};

const streams: pino.StreamEntry[] = [
  {
    level: "debug",
    stream: new ConsoleStream(NODE_ENV === "development" && LOG_PRETTY),
  },
];

if (LOG_TO_FILE) {
  streams.push(
    { level: "debug", stream: createRotatingStream("server") },
    { level: "error", stream: createRotatingStream("error") },
  );
}

/**
 * 메인 로거 인스턴스
 */
const logger: pino.Logger = pino(baseConfig, pino.multistream(streams));

export { logger };

export type Logger = pino.Logger;
