import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { FootfallConfig } from "@footfall/core";
import { PACKAGE_VERSION, createRequestContext, describeError } from "@footfall/core";
import type { IntakePipeline, IntakeResult, PipelineOptions } from "@footfall/detect";
import { createPipeline, extractClientAddress } from "@footfall/detect";
import "./types.js";

/**
 * Options for the footfall() factory beyond the core FootfallConfig.
 * These control Express-specific behavior.
 */
export interface FootfallExpressOptions extends FootfallConfig {
  /**
   * Pre-built pipeline. When given, the FootfallConfig fields of these
   * options are ignored and the pipeline's own configuration is used.
   */
  pipeline?: IntakePipeline;

  /** Passed to createPipeline() when no pipeline is given. */
  pipelineOptions?: PipelineOptions;

  /**
   * Resolves the tenant whose rules apply to a request, for multi-tenant
   * apps (e.g. from the Host header or a route parameter).
   */
  tenant?: (req: Request) => string | undefined;

  /**
   * Requests per minute from the client, as counted by the app's own rate
   * limiter. Feeds the frequency check of bot classification.
   */
  frequency?: (req: Request) => number | undefined;

  /**
   * Called with every intake result, admitted or not. Errors and rejected
   * promises are logged and never reach the request.
   */
  onVisit?: (result: IntakeResult, req: Request) => void | Promise<void>;

  /**
   * If true, admitted requests get `x-footfall-bot`, `x-footfall-bot-type`
   * and `x-footfall-country` response headers. Defaults to false.
   */
  exposeHeaders?: boolean;
}

/**
 * Creates the footfall Express middleware.
 *
 * Usage:
 * ```typescript
 * import { footfall } from "@footfall/express";
 *
 * app.use(footfall({
 *   privacyMode: true,
 *   rules: { exclude: ["/admin/*"] },
 *   onVisit: (visit) => queue.push(visit),
 * }));
 *
 * app.get("/pricing", (req, res) => {
 *   if (req.visit?.classification?.isBot) {
 *     // ...
 *   }
 * });
 * ```
 *
 * The middleware never rejects or delays a request: it sets `req.visit`
 * and always calls `next()`.
 *
 * @param options - FootfallConfig + Express-specific options
 * @throws InvalidConfigError if the configuration is invalid
 */
export function footfall(options: FootfallExpressOptions = {}): RequestHandler {
  const {
    pipeline: prebuilt,
    pipelineOptions,
    tenant,
    frequency,
    onVisit,
    exposeHeaders = false,
    ...config
  } = options;

  const pipeline = prebuilt ?? createPipeline(config, pipelineOptions);
  const { logger, trustedProxies, trustProxyHeaders } = pipeline.config;

  logger.debug(`v${PACKAGE_VERSION} middleware initialized`);

  const notify = (result: IntakeResult, req: Request): void => {
    if (!onVisit) {
      return;
    }
    const report = (err: unknown): void => {
      logger.error("onVisit callback failed", { error: describeError(err) });
    };
    try {
      const pending = onVisit(result, req);
      if (pending) {
        void pending.catch(report);
      }
    } catch (err) {
      report(err);
    }
  };

  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const context = createRequestContext({
        method: req.method,
        path: req.originalUrl,
        headers: req.headers,
        remoteAddress: extractClientAddress(req.headers, req.socket.remoteAddress, {
          trustedProxies,
          trustProxyHeaders,
        }),
        requestFrequency: frequency?.(req),
      });
      const scope = tenant?.(req);
      const result = pipeline.evaluate(context, scope === undefined ? {} : { tenant: scope });

      req.visit = result;

      if (exposeHeaders && result.classification) {
        res.setHeader("x-footfall-bot", String(result.classification.isBot));
        res.setHeader("x-footfall-bot-type", result.classification.botType);
        if (result.geo?.countryCode) {
          res.setHeader("x-footfall-country", result.geo.countryCode);
        }
      }

      notify(result, req);
    } catch (err) {
      logger.error("Request intake failed", { error: describeError(err) });
    }

    next();
  };
}
