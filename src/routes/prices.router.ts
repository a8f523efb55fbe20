/**
 * Prices API Router
 *
 * 금/은 시세 조회 API (읽기 전용)
 * - GET /prices - 금 + 은 전체
 * - GET /prices/gold - 금 시세
 * - GET /prices/silver - 은 시세
 *
 * Query:
 * - vendor: 벤더 ID (기본: DEFAULT_VENDOR)
 *
 * 조회 실패는 PriceFetchError로 errorHandler에 위임
 */

import { Router, Request, RequestHandler, Response } from "express";
import { z } from "zod";
import type { Commodity } from "@/core/domain/PriceRecord";
import { PriceFetchError } from "@/core/domain/PriceFetchError";
import type { IPriceService } from "@/services/PriceService";
import { SERVER_CONFIG } from "@/config/constants";

/**
 * 시세 조회 쿼리 스키마
 */
const PricesQuerySchema = z.object({
  vendor: z.string().min(1).default(SERVER_CONFIG.DEFAULT_VENDOR),
});

/**
 * 쿼리 검증 + 벤더 존재 확인
 *
 * @returns 벤더 ID 또는 null (응답 전송 완료)
 */
function resolveVendor(
  service: IPriceService,
  req: Request,
  res: Response,
): string | null {
  const parsed = PricesQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    res.status(400).json({
      error: "Invalid query",
      details: parsed.error.issues.map((issue) => issue.message),
    });
    return null;
  }

  const { vendor } = parsed.data;
  if (!service.hasVendor(vendor)) {
    res.status(404).json({
      error: "Unknown vendor",
      vendor,
      available: service.listVendors().map((v) => v.id),
    });
    return null;
  }

  return vendor;
}

/**
 * async 핸들러의 reject를 에러 핸들러로 전달
 */
function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createPricesRouter(service: IPriceService): Router {
  const router = Router();

  /**
   * GET /prices
   */
  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const vendor = resolveVendor(service, req, res);
      if (vendor === null) return;

      try {
        res.json(await service.getAllPrices(vendor));
      } catch (error) {
        throw new PriceFetchError(vendor, null, error);
      }
    }),
  );

  /**
   * GET /prices/gold, GET /prices/silver
   */
  const commodityHandler = (commodity: Commodity) =>
    asyncHandler(async (req, res) => {
      const vendor = resolveVendor(service, req, res);
      if (vendor === null) return;

      try {
        res.json(await service.getPrices(vendor, commodity));
      } catch (error) {
        throw new PriceFetchError(vendor, commodity, error);
      }
    });

  router.get("/gold", commodityHandler("gold"));
  router.get("/silver", commodityHandler("silver"));

  return router;
}
