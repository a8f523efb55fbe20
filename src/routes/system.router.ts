/**
 * System API Router
 *
 * - GET / , GET /health - liveness
 * - GET /vendors - 지원 벤더 목록
 */

import { Router } from "express";
import type { IPriceService } from "@/services/PriceService";
import { APP_METADATA } from "@/config/constants";
import { getTimestampWithTimezone } from "@/utils/timestamp";

export function createSystemRouter(service: IPriceService): Router {
  const router = Router();

  router.get(["/", "/health"], (_req, res) => {
    res.json({
      status: "ok",
      message: `${APP_METADATA.NAME} is running`,
      version: APP_METADATA.VERSION,
      timestamp: getTimestampWithTimezone(),
      vendors: service.listVendors().map((v) => v.id),
    });
  });

  router.get("/vendors", (_req, res) => {
    const vendors = service.listVendors();
    res.json({ vendors, count: vendors.length });
  });

  return router;
}
