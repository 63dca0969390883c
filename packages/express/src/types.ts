import type { IntakeResult } from "@footfall/detect";

// ---------------------------------------------------------------------------
// Express Request Augmentation
// ---------------------------------------------------------------------------

declare global {
  namespace Express {
    interface Request {
      /** Intake result, set by the footfall middleware; absent if evaluation failed */
      visit?: IntakeResult;
    }
  }
}

export {};
