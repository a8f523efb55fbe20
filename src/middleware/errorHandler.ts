/**
 * 에러 핸들러 미들웨어
 *
 * - PriceFetchError: 500 + "Error fetching <x> prices: ..." 메시지
 * - 그 외: 500 Internal server error
 * - 정의되지 않은 경로: 404
 */

import { Request, Response, NextFunction } from "express";
import { PriceFetchError } from "@/core/domain/PriceFetchError";
import { logger as rootLogger } from "@/config/logger";
import "@/types/express";

/**
 * 전역 에러 핸들러
 *
 * Express는 인자 4개짜리 함수만 에러 핸들러로 인식
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const logger = req.log ?? rootLogger;

  if (err instanceof PriceFetchError) {
    logger.error({ error: err.toLogObject() }, "시세 조회 실패");
    res.status(500).json({ error: err.message });
    return;
  }

  logger.error(
    {
      error: { name: err.name, message: err.message, stack: err.stack },
      query: req.query,
    },
    "처리되지 않은 오류",
  );

  res.status(500).json({
    error: "Internal server error",
    message: err.message,
    ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
  });
}

/**
 * 404 핸들러
 */
export function notFoundHandler(req: Request, res: Response): void {
  (req.log ?? rootLogger).warn("경로를 찾을 수 없음");

  res.status(404).json({
    error: "Not found",
    path: req.path,
  });
}
