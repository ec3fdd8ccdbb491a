/**
 * Centralized path configuration for the server.
 *
 * CODE paths: resolved from this module's location, so they work from src/
 * under the test runner and from dist/ after a build.
 *
 * DATA paths: resolved from process.cwd(), so a test or a second instance can
 * run against its own dataConfig directory.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const Paths = {
  codeRoot: path.resolve(__dirname, ".."),
  get catalog() { return path.join(this.codeRoot, "dataCountries"); },

  dataRoot: process.cwd(),
  get dataConfig() { return path.join(this.dataRoot, "dataConfig"); },
};
