import { Router, type Request, type Response } from "express";
import type { TravelSummaryService } from "../travel-summary.js";
import { optionalBodyString, requireBodyString } from "./request-fields.js";

export function createTravelSummaryRouter(summaries: TravelSummaryService): Router {
  const router = Router();

  /**
   * POST /travel-summary
   * Body: { "country_code": "JP" }
   */
  router.post("/travel-summary", async (req: Request, res: Response) => {
    const countryCode = optionalBodyString(req.body, "country_code");
    res.json(await summaries.summaryByCode(countryCode));
  });

  /**
   * POST /travel-summary-by-name
   * Body: { "country_name": "Japan" }
   */
  router.post("/travel-summary-by-name", async (req: Request, res: Response) => {
    const countryName = requireBodyString(req.body, "country_name");
    res.json(await summaries.summaryByName(countryName));
  });

  return router;
}
