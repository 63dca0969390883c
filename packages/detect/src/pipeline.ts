/**
 * The intake pipeline: admission, then classification, geo, identity and
 * address hashing for admitted requests.
 *
 * Configuration is validated once, when the pipeline is created. After that
 * `evaluate()` never throws: a stage that fails is logged and replaced by
 * its empty result.
 */

import type {
  Admission,
  ClassificationResult,
  FootfallConfig,
  GeoResult,
  Identity,
  Logger,
  RequestContext,
  ResolvedConfig,
  RuleScope,
} from "@footfall/core";
import { createRequestContext, describeError, hashAddress, resolveConfig } from "@footfall/core";
import type { RuleEngineOptions } from "./rules/engine.js";
import { RuleEngine } from "./rules/engine.js";
import type { BotClassifier } from "./bots.js";
import { createBotClassifier } from "./bots.js";
import { resolve } from "./geo/resolver.js";
import { fingerprint } from "./identity.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface IntakeResult {
  admission: Admission;
  /** Present only for admitted requests */
  classification?: ClassificationResult;
  geo?: GeoResult;
  identity?: Identity;
  /** Salted address hash; present when `addressSalt` is configured */
  addressHash?: string;
}

export interface EvaluateOptions {
  /** Tenant whose rules apply in addition to the global ones */
  tenant?: string;
}

export interface PipelineOptions extends RuleEngineOptions {
  /** Replaces the default bot classifier */
  classifier?: BotClassifier;
}

export interface IntakePipeline {
  evaluate(context: RequestContext, options?: EvaluateOptions): IntakeResult;
  readonly rules: RuleEngine;
  readonly config: ResolvedConfig;
}

// ---------------------------------------------------------------------------
// Fallbacks
// ---------------------------------------------------------------------------

const ALLOW: Admission = { decision: "allow" };

const UNCLASSIFIED: ClassificationResult = {
  isBot: false,
  botType: "human",
  confidence: 0,
  signals: [],
};

function runStage<T>(stage: string, logger: Logger, run: () => T, fallback: () => T): T {
  try {
    return run();
  } catch (err) {
    logger.error(`Intake stage "${stage}" failed, using its empty result`, {
      error: describeError(err),
    });
    return fallback();
  }
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Validate a configuration and build a pipeline from it.
 *
 * @throws InvalidConfigError if the configuration is invalid
 * @throws InvalidRuleError if `strictRules` is set and a global rule is unusable
 *
 * @example
 * ```ts
 * const pipeline = createPipeline({ rules: { exclude: ["/admin/*"] } });
 * const result = pipeline.evaluate(createRequestContext({ path: "/pricing", headers }));
 * if (result.admission.decision === "allow") {
 *   store(result);
 * }
 * ```
 */
export function createPipeline(
  config: FootfallConfig = {},
  options: PipelineOptions = {},
): IntakePipeline {
  const resolved = resolveConfig(config);
  const { logger } = resolved;
  const rules = new RuleEngine(resolved, options);
  const classifier = options.classifier ?? createBotClassifier();

  const evaluate = (context: RequestContext, evaluateOptions: EvaluateOptions = {}): IntakeResult => {
    const scope: RuleScope =
      evaluateOptions.tenant === undefined ? "global" : { tenant: evaluateOptions.tenant };

    const admission = runStage("admission", logger, () => rules.admit(context, scope), () => ALLOW);
    if (admission.decision === "block") {
      return { admission };
    }

    const result: IntakeResult = {
      admission,
      classification: runStage(
        "classification",
        logger,
        () => classifier.classify(context),
        () => ({ ...UNCLASSIFIED, signals: [] }),
      ),
      geo: resolve(context.headers, resolved.precisionLevel, resolved.privacyMode, {
        remoteAddress: context.remoteAddress,
        detectVpn: resolved.detectVpn,
        anonymizeAddressLevel: resolved.anonymizeAddressLevel,
        providerPriority: resolved.providerPriority,
        logger,
      }),
      identity: runStage(
        "identity",
        logger,
        () => fingerprint(context, resolved.privacyMode),
        () => fingerprint(createRequestContext(), true),
      ),
    };

    const salt = resolved.addressSalt;
    if (salt !== undefined && context.remoteAddress !== undefined) {
      const address = context.remoteAddress;
      const hash = runStage<string | undefined>(
        "address hash",
        logger,
        () => hashAddress(address, salt),
        () => undefined,
      );
      if (hash !== undefined) {
        result.addressHash = hash;
      }
    }

    return result;
  };

  return { evaluate, rules, config: resolved };
}
