/**
 * Request Logger 미들웨어
 * Pino HTTP 요청 로깅 미들웨어
 *
 * 기능:
 * - 모든 HTTP 요청 자동 로깅
 * - Request ID 생성 및 추적
 * - 응답 시간 측정
 * - Health check 요청은 debug 레벨로 기록
 */

import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { createRequestLogger } from "@/utils/LoggerContext";
import "@/types/express";

/**
 * 낮은 레벨로 기록할 경로 목록 (liveness probe)
 */
const QUIET_PATHS = ["/", "/health"];

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const requestId = uuidv4();
  const startTime = Date.now();
  const quiet = QUIET_PATHS.includes(req.path);

  const logger = createRequestLogger(requestId, req.method, req.path);
  req.log = logger;
  req.id = requestId;

  logger[quiet ? "debug" : "info"](
    {
      query: req.query,
      ip: req.ip,
    },
    "요청 수신",
  );

  res.on("finish", () => {
    const duration = Date.now() - startTime;
    const logLevel =
      res.statusCode >= 400 ? "error" : quiet ? "debug" : "info";

    logger[logLevel](
      {
        status: res.statusCode,
        duration_ms: duration,
      },
      "요청 완료",
    );
  });

  next();
}
