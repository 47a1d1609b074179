import type { ElementKind } from "./model/elements.js";

export interface FidelityWarning {
  variant: ElementKind;
  reason: string;
}

/** Receives the elements a generator dropped because its format cannot hold them. */
export interface WarningSink {
  warn(variant: ElementKind, reason: string): void;
}

export class CollectingWarningSink implements WarningSink {
  readonly warnings: FidelityWarning[] = [];

  warn(variant: ElementKind, reason: string): void {
    this.warnings.push({ variant, reason });
  }
}

export const IGNORE_WARNINGS: WarningSink = {
  warn() {},
};
