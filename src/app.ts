/**
 * Express 앱 구성
 * 서버 기동(server.ts)과 분리하여 테스트에서 서비스 주입 가능
 */

import express, { type Express } from "express";
import cors from "cors";
import { createPricesRouter } from "@/routes/prices.router";
import { createSystemRouter } from "@/routes/system.router";
import { errorHandler, notFoundHandler } from "@/middleware/errorHandler";
import { requestLogger } from "@/middleware/requestLogger";
import type { IPriceService } from "@/services/PriceService";

export function createApp(service: IPriceService): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(cors());
  app.use(requestLogger);

  app.use("/", createSystemRouter(service));
  app.use("/prices", createPricesRouter(service));

  // 404 핸들러
  app.use(notFoundHandler);

  // 전역 에러 핸들러
  app.use(errorHandler);

  return app;
}
