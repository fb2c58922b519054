export type VehicleCategory = "passenger" | "truck" | "bus" | "motorcycle" | "bicycle" | "emergency";

export const VEHICLE_CATEGORIES: readonly VehicleCategory[] = [
  "passenger",
  "truck",
  "bus",
  "motorcycle",
  "bicycle",
  "emergency"
];

export interface CategoryRule {
  patterns: readonly string[];
  category: VehicleCategory;
}

// First match wins.
export const CATEGORY_RULES: readonly CategoryRule[] = [
  { patterns: ["bus"], category: "bus" },
  { patterns: ["truck", "trailer"], category: "truck" },
  { patterns: ["motorcycle", "moped"], category: "motorcycle" },
  { patterns: ["bicycle"], category: "bicycle" },
  { patterns: ["emergency", "police", "ambulance"], category: "emergency" }
];

export function inferVehicleCategory(
  typeTag: string,
  rules: readonly CategoryRule[] = CATEGORY_RULES
): VehicleCategory {
  const tag = typeTag.toLowerCase();
  for (const rule of rules) {
    if (rule.patterns.some((pattern) => tag.includes(pattern))) {
      return rule.category;
    }
  }
  return "passenger";
}
