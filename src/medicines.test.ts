import { describe, expect, test } from "vitest";
import {
  generateMedicineSummary,
  getMedicineInteractions,
  getMedicineRecommendations,
} from "./medicines";

describe("medicine recommendations", () => {
  test("mild cases get the first two medications", () => {
    const r = getMedicineRecommendations("diabetes", "mild");
    expect(r?.medications.map((m) => m.name)).toEqual(["Metformin", "Insulin"]);
  });

  test("other severities get all medications", () => {
    expect(getMedicineRecommendations("diabetes", "severe")?.medications).toHaveLength(4);
    expect(getMedicineRecommendations("diabetes")?.medications).toHaveLength(4);
  });

  test("unknown conditions return null", () => {
    expect(getMedicineRecommendations("stomach_issues")).toBeNull();
    expect(getMedicineRecommendations("toString")).toBeNull();
  });

  test("returns a copy", () => {
    const first = getMedicineRecommendations("fever");
    first?.medications.pop();
    first?.lifestyle.push("changed");
    const second = getMedicineRecommendations("fever");
    expect(second?.medications).toHaveLength(2);
    expect(second?.lifestyle).not.toContain("changed");
  });
});

describe("interactions", () => {
  test("matches names case-insensitively", () => {
    expect(getMedicineInteractions([{ name: "warfarin" }, { name: "ASPIRIN" }])).toEqual([
      {
        medicines: ["Warfarin", "Aspirin"],
        severity: "High",
        description: "Increased bleeding risk",
        recommendation: "Monitor INR closely",
      },
    ]);
  });

  test("no pair, no interaction", () => {
    expect(getMedicineInteractions([{ name: "Aspirin" }, { name: "Metformin" }])).toEqual([]);
  });
});

describe("summary", () => {
  test("lists medications, side effects and lifestyle", () => {
    const lines = generateMedicineSummary("fever", getMedicineRecommendations("fever")).split(
      "\n"
    );
    expect(lines[0]).toBe("**Medicine Recommendations for Fever:**");
    expect(lines).toContain(
      "• Ibuprofen (200-400mg every 6-8 hours) - NSAID for fever, pain, and inflammation"
    );
    expect(lines).toContain("  Side effects: Stomach upset, Dizziness, Headache");
    expect(lines).toContain("**Lifestyle Recommendations:**");
    expect(lines).not.toContain("**Monitoring Requirements:**");
  });

  test("title-cases condition names", () => {
    const summary = generateMedicineSummary(
      "cough_cold",
      getMedicineRecommendations("cough_cold")
    );
    expect(summary.startsWith("**Medicine Recommendations for Cough Cold:**")).toBe(true);
  });

  test("null recommendations", () => {
    expect(generateMedicineSummary("stomach_issues", null)).toBe(
      "No specific medicine recommendations available for this condition."
    );
  });
});
