import { classify } from "./classifier";
import {
  generateMedicineSummary,
  getMedicineInteractions,
  getMedicineRecommendations,
} from "./medicines";
import type { ChatReply, MedicineSeverity, Urgency } from "./types";

export const EMERGENCY_REPLY =
  "🚨 MEDICAL EMERGENCY: This requires immediate medical attention! Please call emergency services (911/112) right now or go to the nearest emergency room. Do not delay seeking help.";

export const URGENT_REPLY =
  "⚠️ URGENT: This needs prompt medical attention. Please contact your doctor immediately or visit urgent care within the next few hours. Monitor your symptoms closely.";

export const GENERAL_REPLY =
  "I understand you're experiencing health concerns. While I can provide general guidance, it's important to consult with a healthcare professional for proper evaluation and treatment. If symptoms are severe or concerning, please seek medical attention promptly.";

export const EMPTY_MESSAGE_REPLY = "Please provide a message.";

/**
 * Topic rules checked in order after urgency. `severe` holds the variant
 * used when the message also matches `escalate`.
 */
const TOPIC_RULES: {
  match: RegExp;
  escalate?: RegExp;
  normal: string;
  severe?: string;
}[] = [
  {
    match: /fever|cold|flu/,
    escalate: /high|severe|over 101/,
    severe:
      "For high fever (above 101.3°F/38.5°C), monitor closely and consider contacting your doctor. Stay hydrated, rest, and use fever-reducing medications as directed. If fever persists or worsens, seek medical care.",
    normal:
      "For mild fever, rest, stay hydrated, and monitor your temperature. Over-the-counter fever reducers can help. If symptoms persist beyond 3-5 days or worsen, consult a healthcare provider.",
  },
  {
    match: /headache|migraine/,
    escalate: /severe|worst|thunderclap/,
    severe:
      "Severe headaches require medical evaluation, especially if sudden onset or 'worst headache ever.' Keep a headache diary and consult your doctor. Consider emergency care if accompanied by fever, neck stiffness, or neurological symptoms.",
    normal:
      "For mild to moderate headaches, try rest, hydration, and over-the-counter pain relief. Identify and avoid triggers. If headaches are frequent, severe, or changing pattern, consult a healthcare provider.",
  },
  {
    match: /cough|chest|breathing/,
    escalate: /severe|can't breathe|shortness of breath/,
    severe:
      "Severe breathing difficulties require immediate medical attention. If you're having trouble breathing, call emergency services or go to the ER immediately.",
    normal:
      "For mild respiratory symptoms, rest, stay hydrated, and use a humidifier. Monitor for worsening symptoms. If cough persists beyond 2-3 weeks or worsens, consult a healthcare provider.",
  },
  {
    match: /stomach|nausea|vomiting|diarrhea/,
    normal:
      "For gastrointestinal symptoms, stay hydrated with clear fluids, eat bland foods, and rest. Avoid dairy and fatty foods. If symptoms persist beyond 2-3 days, include blood, or are severe, consult a healthcare provider.",
  },
  {
    match: /pain|ache|sore/,
    normal:
      "For pain management, try rest, ice/heat therapy, and over-the-counter pain relievers. If pain is severe, persistent, or accompanied by other concerning symptoms, consult a healthcare provider.",
  },
];

const SEVERITY_BY_URGENCY: Record<Urgency, MedicineSeverity> = {
  emergency: "severe",
  urgent: "urgent",
  normal: "moderate",
};

/**
 * Fixed guidance text for a message.
 */
export function ruleBasedReply(message: string, urgency: Urgency): string {
  if (urgency === "emergency") return EMERGENCY_REPLY;
  if (urgency === "urgent") return URGENT_REPLY;

  const t = message.toLowerCase();
  for (const rule of TOPIC_RULES) {
    if (!rule.match.test(t)) continue;
    if (rule.escalate && rule.severe && rule.escalate.test(t)) return rule.severe;
    return rule.normal;
  }
  return GENERAL_REPLY;
}

/**
 * Builds the full chat response: guidance text, classification and, when a
 * condition is detected, medicine recommendations.
 */
export function buildChatReply(message: string): ChatReply {
  if (!message.trim()) {
    return {
      reply: EMPTY_MESSAGE_REPLY,
      condition: "none",
      urgency: "normal",
      keywords: [],
      medicines: null,
      medicineSummary: null,
      interactions: [],
    };
  }

  const match = classify(message);
  const reply = ruleBasedReply(message, match.urgency);

  if (match.category === "none") {
    return {
      reply,
      condition: "none",
      urgency: match.urgency,
      keywords: match.keywords,
      medicines: null,
      medicineSummary: null,
      interactions: [],
    };
  }

  const medicines = getMedicineRecommendations(
    match.category,
    SEVERITY_BY_URGENCY[match.urgency]
  );
  const interactions =
    medicines && medicines.medications.length > 1
      ? getMedicineInteractions(medicines.medications)
      : [];

  return {
    reply,
    condition: match.category,
    urgency: match.urgency,
    keywords: match.keywords,
    medicines,
    medicineSummary: generateMedicineSummary(match.category, medicines),
    interactions,
  };
}
