import { defineClassifier, type Classifier } from "../variant/classify";
import { variant, type Unit } from "../variant/types";

export type IntCategory = Unit<"Small"> | Unit<"Medium"> | Unit<"Big"> | Unit<"Weird">;

export const IntCategory = {
  Small: variant("Small"),
  Medium: variant("Medium"),
  Big: variant("Big"),
  Weird: variant("Weird"),
} as const;

/**
 * Lower bounds of each range; `weirdFrom` closes the Big range. Anything
 * outside `[smallFrom, weirdFrom)` is Weird.
 */
export type IntCategoryThresholds = {
  smallFrom: number;
  mediumFrom: number;
  bigFrom: number;
  weirdFrom: number;
};

export const DEFAULT_INT_CATEGORY_THRESHOLDS: IntCategoryThresholds = {
  smallFrom: 0,
  mediumFrom: 1000,
  bigFrom: 100_000,
  weirdFrom: 1_000_000,
};

export function intCategoryClassifier(
  thresholds: IntCategoryThresholds = DEFAULT_INT_CATEGORY_THRESHOLDS
): Classifier<IntCategory> {
  return defineClassifier<IntCategory>(
    "IntCategory",
    [
      { from: thresholds.smallFrom, until: thresholds.mediumFrom, variant: IntCategory.Small },
      { from: thresholds.mediumFrom, until: thresholds.bigFrom, variant: IntCategory.Medium },
      { from: thresholds.bigFrom, until: thresholds.weirdFrom, variant: IntCategory.Big },
    ],
    IntCategory.Weird
  );
}

export const classifyInt = intCategoryClassifier();

export function describeIntCategory(category: IntCategory): string {
  switch (category.tag) {
    case "Small":
      return "small";
    case "Medium":
      return "medium";
    case "Big":
      return "big";
    case "Weird":
      return "weird";
  }
}
