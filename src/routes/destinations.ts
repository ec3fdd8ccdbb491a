/**
 * GET /destinations         - popular destinations
 * GET /destinations/search  - name to country code (?country=Japan)
 * GET /destinations/:code   - one country by alpha-2 or alpha-3 code
 */

import { Router, type Request, type Response } from "express";
import type { CountryDirectory } from "../country-directory.js";
import { requireQueryString } from "./request-fields.js";

export function createDestinationsRouter(directory: CountryDirectory): Router {
  const router = Router();

  router.get("/", async (_req: Request, res: Response) => {
    res.json(await directory.listPopular());
  });

  // Registered before /:code so "search" is not taken for a country code.
  router.get("/search", async (req: Request, res: Response) => {
    const country = requireQueryString(req.query.country, "country");
    res.json(await directory.searchByName(country));
  });

  router.get("/:code", async (req: Request<{ code: string }>, res: Response) => {
    res.json(await directory.getByCode(req.params.code));
  });

  return router;
}
