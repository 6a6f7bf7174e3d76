// Advisory Summary: asks a chat model for a qualitative reading of the
// detections and parses its reply into a tagged AdvisorySummary.
//
// The model's answer is advisory only. Its confidence is never used, and any
// reply that is not a JSON object becomes `unparsed`, which the reconciler
// replaces with the deterministic default seed.

import type {
  AdvisoryFields,
  AdvisorySummary,
  PredictionSet,
  RiskLevel,
  RockSize,
  Trajectory,
} from "./types.js";
import { RISK_LEVELS, ROCK_SIZES, TRAJECTORIES } from "./types.js";

// ─── Collaborator interface ─────────────────────────────────────────────────────

export interface AdvisorySummarizer {
  summarize(predictionsText: string): Promise<string>;
}

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user"; content: string }>;
        response_format?: { type: "json_object" };
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

// ─── Prompt ─────────────────────────────────────────────────────────────────────

export const ADVISORY_SYSTEM_PROMPT = `You are reviewing object-detection results from video of a mine wall or cave interior.
Give a short qualitative reading of the detections, focusing on the most confident one.
Classify:
- riskLevel: Low, Medium, High or VeryHigh
- confidence: integer 0-100
- rockSize: Small, Medium or Large
- trajectory: Stable, Moderate or Unstable
- recommendations: 1-3 short actionable items

Return ONLY a JSON object of this form:
{
  "riskLevel": "...",
  "confidence": 0,
  "rockSize": "...",
  "trajectory": "...",
  "recommendations": ["..."]
}`;

export const NO_PREDICTIONS_TEXT = "No predictions available";

/** One line per retained detection: `frame_3: rock (conf=0.80)`. */
export function formatPredictionsText(set: PredictionSet): string {
  const lines: string[] = [];
  for (const frame of set.frames) {
    for (const detection of frame.detections) {
      lines.push(`frame_${frame.frameIndex}: ${detection.class} (conf=${detection.confidence.toFixed(2)})`);
    }
  }
  return lines.length > 0 ? lines.join("\n") : NO_PREDICTIONS_TEXT;
}

// ─── OpenAI summarizer ──────────────────────────────────────────────────────────

export class OpenAIAdvisorySummarizer implements AdvisorySummarizer {
  constructor(
    private readonly openai: OpenAIClient,
    private readonly model: string = "gpt-4o-mini",
  ) {}

  async summarize(predictionsText: string): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: ADVISORY_SYSTEM_PROMPT },
        { role: "user", content: `Predictions:\n${predictionsText}` },
      ],
      response_format: { type: "json_object" },
      temperature: 0.2,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("LLM returned empty response");
    }
    return content;
  }
}

// ─── Parsing ────────────────────────────────────────────────────────────────────

/** Remove a surrounding Markdown code fence, with or without a `json` tag. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(/^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/);
  return match ? match[1].trim() : trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function canonical(value: string): string {
  return value.replace(/[\s_-]+/g, "").toLowerCase();
}

/** Case- and spacing-insensitive lookup: "very high" → "VeryHigh". */
function matchEnum<T extends string>(value: unknown, options: readonly T[]): T | undefined {
  if (typeof value !== "string") return undefined;
  const wanted = canonical(value);
  return options.find((option) => canonical(option) === wanted);
}

function parseFields(obj: Record<string, unknown>): AdvisoryFields {
  const fields: AdvisoryFields = {};

  const riskLevel: RiskLevel | undefined = matchEnum(obj.riskLevel, RISK_LEVELS);
  if (riskLevel) fields.riskLevel = riskLevel;

  if (typeof obj.confidence === "number" && Number.isFinite(obj.confidence)) {
    fields.confidence = obj.confidence;
  }

  const rockSize: RockSize | undefined = matchEnum(obj.rockSize, ROCK_SIZES);
  if (rockSize) fields.rockSize = rockSize;

  const trajectory: Trajectory | undefined = matchEnum(obj.trajectory, TRAJECTORIES);
  if (trajectory) fields.trajectory = trajectory;

  if (Array.isArray(obj.recommendations)) {
    fields.recommendations = obj.recommendations.filter(
      (item: unknown): item is string => typeof item === "string" && item.trim().length > 0,
    );
  }

  return fields;
}

/**
 * Parse the model's reply. Never throws: anything that is not a JSON object
 * is reported as `unparsed` with the reason.
 */
export function parseAdvisorySummary(text: string): AdvisorySummary {
  const cleaned = stripCodeFence(text);
  if (cleaned.length === 0) {
    return { kind: "unparsed", reason: "advisory reply is empty" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch {
    return { kind: "unparsed", reason: `advisory reply is not JSON: ${cleaned.slice(0, 200)}` };
  }

  if (!isRecord(parsed)) {
    return { kind: "unparsed", reason: "advisory reply is not a JSON object" };
  }

  return { kind: "parsed", fields: parseFields(parsed) };
}
