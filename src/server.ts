/**
 * Gold & Silver Price Scraper 서버
 */

import "dotenv/config";
import { createApp } from "@/app";
import { PriceService } from "@/services/PriceService";
import { ExtractorRegistry } from "@/extractors/ExtractorRegistry";
import { createServiceLogger, logImportant } from "@/utils/LoggerContext";
import { APP_METADATA, SERVER_CONFIG, SERVICE_NAMES } from "@/config/constants";

const logger = createServiceLogger(SERVICE_NAMES.SERVER);

// 벤더 설정 로드 실패는 기동 실패로 처리
const registry = ExtractorRegistry.getInstance();
const app = createApp(new PriceService(registry));

const server = app.listen(SERVER_CONFIG.PORT, () => {
  logImportant(logger, `${APP_METADATA.NAME} 서버 시작`, {
    port: SERVER_CONFIG.PORT,
    env: process.env.NODE_ENV || "development",
    version: APP_METADATA.VERSION,
    vendors: registry.list(),
    default_vendor: SERVER_CONFIG.DEFAULT_VENDOR,
  });

  logger.info(
    {
      endpoints: {
        health: "GET /health",
        vendors: "GET /vendors",
        prices: "GET /prices?vendor=",
        gold: "GET /prices/gold?vendor=",
        silver: "GET /prices/silver?vendor=",
      },
    },
    "엔드포인트 등록 완료",
  );
});

// Graceful shutdown
function shutdown(signal: NodeJS.Signals): void {
  logger.warn(`${signal} 수신, 서버 종료 중...`);

  server.close(() => {
    logImportant(logger, "서버 종료 완료", {});
    process.exit(0);
  });
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
