/**
 * @footfall/express - Express.js middleware adapter for footfall
 *
 * Run the intake pipeline on every request in one line:
 *
 * ```typescript
 * import express from "express";
 * import { footfall } from "@footfall/express";
 *
 * const app = express();
 * app.use(footfall({ privacyMode: true }));
 *
 * app.get("/", (req, res) => {
 *   if (req.visit?.admission.decision === "allow") {
 *     console.log(req.visit.identity, req.visit.geo?.countryCode);
 *   }
 *   res.send("hello");
 * });
 *
 * app.listen(3000);
 * ```
 */

import "./types.js";

// Main factory function
export { footfall } from "./middleware.js";
export type { FootfallExpressOptions } from "./middleware.js";

// Re-export commonly used types so consumers
// don't need to separately install @footfall/core and @footfall/detect for types
export type {
  FootfallConfig,
  Admission,
  BlockReason,
  ClassificationResult,
  GeoResult,
  Identity,
} from "@footfall/core";
export type { IntakeResult, IntakePipeline } from "@footfall/detect";
