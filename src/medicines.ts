import { z } from "zod";
import medicineTable from "../data/medicines.json";
import type {
  Medication,
  MedicineInteraction,
  MedicineRecommendations,
  MedicineSeverity,
} from "./types";

const medicationSchema = z.object({
  name: z.string(),
  dosage: z.string(),
  type: z.string(),
  description: z.string(),
  sideEffects: z.array(z.string()),
  contraindications: z.array(z.string()),
  category: z.string(),
});

const recommendationsSchema = z.object({
  medications: z.array(medicationSchema),
  lifestyle: z.array(z.string()),
  monitoring: z.array(z.string()),
});

const MEDICINES: Record<string, MedicineRecommendations> = z
  .record(recommendationsSchema)
  .parse(medicineTable);

/**
 * Recommendations for a condition, or `null` when none are on file.
 *
 * Mild cases get only the first two medications. The result is a copy.
 */
export function getMedicineRecommendations(
  condition: string,
  severity: MedicineSeverity = "moderate"
): MedicineRecommendations | null {
  const entry = Object.prototype.hasOwnProperty.call(MEDICINES, condition)
    ? MEDICINES[condition]
    : undefined;
  if (!entry) return null;

  const medications = entry.medications.map((m) => ({
    ...m,
    sideEffects: [...m.sideEffects],
    contraindications: [...m.contraindications],
  }));

  return {
    medications: severity === "mild" ? medications.slice(0, 2) : medications,
    lifestyle: [...entry.lifestyle],
    monitoring: [...entry.monitoring],
  };
}

const KNOWN_INTERACTIONS: MedicineInteraction[] = [
  {
    medicines: ["Warfarin", "Aspirin"],
    severity: "High",
    description: "Increased bleeding risk",
    recommendation: "Monitor INR closely",
  },
  {
    medicines: ["Metformin", "Insulin"],
    severity: "Moderate",
    description: "Increased risk of hypoglycemia",
    recommendation: "Monitor blood glucose closely",
  },
];

/**
 * Known pairwise interactions among the given medications (names compared
 * case-insensitively).
 */
export function getMedicineInteractions(
  medications: readonly Pick<Medication, "name">[]
): MedicineInteraction[] {
  const names = new Set(medications.map((m) => m.name.toLowerCase()));
  return KNOWN_INTERACTIONS.filter(
    ({ medicines: [a, b] }) => names.has(a.toLowerCase()) && names.has(b.toLowerCase())
  ).map((i): MedicineInteraction => ({ ...i, medicines: [i.medicines[0], i.medicines[1]] }));
}

function titleCase(condition: string): string {
  return condition
    .split("_")
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1).toLowerCase() : w))
    .join(" ");
}

/**
 * Human-readable summary of recommendations for a chat reply.
 */
export function generateMedicineSummary(
  condition: string,
  recommendations: MedicineRecommendations | null
): string {
  if (!recommendations) {
    return "No specific medicine recommendations available for this condition.";
  }

  const lines: string[] = [
    `**Medicine Recommendations for ${titleCase(condition)}:**`,
    "",
    "**Medications:**",
  ];

  for (const med of recommendations.medications) {
    lines.push(`• ${med.name} (${med.dosage}) - ${med.description}`);
    if (med.sideEffects.length > 0) {
      lines.push(`  Side effects: ${med.sideEffects.join(", ")}`);
    }
    lines.push("");
  }

  if (recommendations.lifestyle.length > 0) {
    lines.push("**Lifestyle Recommendations:**");
    for (const item of recommendations.lifestyle) lines.push(`• ${item}`);
    lines.push("");
  }

  if (recommendations.monitoring.length > 0) {
    lines.push("**Monitoring Requirements:**");
    for (const item of recommendations.monitoring) lines.push(`• ${item}`);
  }

  lines.push(
    "",
    "**⚠️ Important:** Always consult with a healthcare professional before starting any new medication."
  );
  return lines.join("\n");
}
