import type { BoundingBox, ElementSnapshot } from "./driver-types";
import type { SuccessPredicate } from "./retry-engine";

export const ACTIONABILITY_REASONS = {
  notAttached: "element not attached",
  notVisible: "element not visible",
  notStable: "element not stable",
  noPointerEvents: "element does not receive pointer events",
  disabled: "element disabled"
} as const;

export type ActionabilityCheck = "attached" | "visible" | "stable" | "receivesEvents" | "enabled";

const ALL_CHECKS: ActionabilityCheck[] = ["attached", "visible", "stable", "receivesEvents", "enabled"];

export function sameBox(left: BoundingBox | null, right: BoundingBox | null): boolean {
  if (!left || !right) return false;
  return left.x === right.x
    && left.y === right.y
    && left.width === right.width
    && left.height === right.height;
}

/**
 * Predicate for action retries. Every requested check must hold on the same poll;
 * stability compares this poll's box with the previous poll's, so the predicate
 * carries state and a fresh one is needed per operation.
 */
export function createActionabilityPredicate(
  checks: ActionabilityCheck[] = ALL_CHECKS
): SuccessPredicate<ElementSnapshot> {
  const wanted = new Set(checks);
  let previousBox: BoundingBox | null = null;

  return (snapshot) => {
    const lastBox = previousBox;
    previousBox = snapshot.exists ? snapshot.boundingBox : null;

    if (!snapshot.exists) {
      return { pass: false, reason: ACTIONABILITY_REASONS.notAttached };
    }
    if (snapshot.count > 1) {
      return { pass: false, reason: `selector resolved to ${snapshot.count} elements` };
    }
    if (wanted.has("visible") && !snapshot.visible) {
      return { pass: false, reason: ACTIONABILITY_REASONS.notVisible };
    }
    if (wanted.has("stable") && (snapshot.stable === false || !sameBox(lastBox, snapshot.boundingBox))) {
      return { pass: false, reason: ACTIONABILITY_REASONS.notStable };
    }
    if (wanted.has("receivesEvents") && !snapshot.receivesEvents) {
      return { pass: false, reason: ACTIONABILITY_REASONS.noPointerEvents };
    }
    if (wanted.has("enabled") && !snapshot.enabled) {
      return { pass: false, reason: ACTIONABILITY_REASONS.disabled };
    }
    return true;
  };
}
