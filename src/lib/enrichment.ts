import { GoogleGenerativeAI } from "@google/generative-ai";
import { z } from "zod";
import type { Logger } from "./logger";
import { PLANNER_SYSTEM_PROMPT, plannerUserPrompt } from "./prompts";
import type { AnalysisResult, DayPlan } from "./schemas";

const DayEntrySchema = z.object({
  day: z.string().min(1),
  tasks: z.array(z.string()),
  focus: z.string(),
  self_care: z.string(),
});

const ModelOutputSchema = z.object({
  emotion: z.string().trim().min(1),
  sentiment_score: z.number().finite(),
  weekly_plan: z.array(DayEntrySchema).min(1),
});

const FALLBACK_PLAN: readonly DayPlan[] = [
  {
    day: "Monday",
    tasks: ["Review weekly goals", "Organize workspace", "Plan the week ahead"],
    focus: "Organization and clarity",
    selfCare: "Take a 15-minute walk",
  },
  {
    day: "Tuesday",
    tasks: ["Focus on priority tasks", "Respond to pending messages", "Document progress"],
    focus: "Productivity",
    selfCare: "Practice deep breathing exercises",
  },
  {
    day: "Wednesday",
    tasks: ["Midweek review", "Adjust plans if needed", "Connect with a colleague"],
    focus: "Adaptation and connection",
    selfCare: "Enjoy a healthy lunch mindfully",
  },
  {
    day: "Thursday",
    tasks: ["Continue priority work", "Prepare for end of week", "Learn something new"],
    focus: "Growth and momentum",
    selfCare: "Listen to calming music",
  },
  {
    day: "Friday",
    tasks: ["Complete weekly tasks", "Review accomplishments", "Set intentions for next week"],
    focus: "Completion and reflection",
    selfCare: "Celebrate small wins",
  },
  {
    day: "Saturday",
    tasks: ["Rest and recharge", "Pursue a hobby", "Spend time with loved ones"],
    focus: "Personal time",
    selfCare: "Sleep in if needed",
  },
  {
    day: "Sunday",
    tasks: ["Gentle preparation for the week", "Meal prep", "Relaxation"],
    focus: "Renewal",
    selfCare: "Practice gratitude journaling",
  },
];

/**
 * The payload used whenever inference is unavailable or returns something
 * unusable. Every call returns an equal, independent copy.
 */
export function fallbackAnalysis(): AnalysisResult {
  return {
    emotion: "neutral",
    sentimentScore: 50,
    weeklyPlan: structuredClone([...FALLBACK_PLAN]),
    fallback: true,
  };
}

/** Sends one prompt and resolves with the raw response text. */
export type TextGenerator = (prompt: string) => Promise<string>;

export type GeneratorFactory = (apiKey: string) => TextGenerator;

export interface GeminiOptions {
  model: string;
  timeoutMs: number;
}

export function geminiGeneratorFactory({ model, timeoutMs }: GeminiOptions): GeneratorFactory {
  return (apiKey) => {
    const genAI = new GoogleGenerativeAI(apiKey);
    const generativeModel = genAI.getGenerativeModel(
      {
        model,
        systemInstruction: PLANNER_SYSTEM_PROMPT,
        generationConfig: {
          temperature: 0.7,
          maxOutputTokens: 2048,
          responseMimeType: "application/json",
        },
      },
      { timeout: timeoutMs },
    );
    return async (prompt) => {
      const result = await generativeModel.generateContent(prompt);
      return result.response.text();
    };
  };
}

/**
 * Strips a wrapping ```json fence if the model added one anyway.
 */
export function stripJsonFence(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");
}

export function parseAnalysis(text: string): AnalysisResult {
  const output = ModelOutputSchema.parse(JSON.parse(stripJsonFence(text)));
  return {
    emotion: output.emotion,
    sentimentScore: Math.min(100, Math.max(0, Math.round(output.sentiment_score))),
    weeklyPlan: output.weekly_plan.map((entry) => ({
      day: entry.day,
      tasks: entry.tasks,
      focus: entry.focus,
      selfCare: entry.self_care,
    })),
    fallback: false,
  };
}

export interface Enricher {
  analyze(text: string, apiKey: string): Promise<AnalysisResult>;
}

/**
 * Best-effort analysis. Never rejects: anything that goes wrong on the way to
 * a valid model response degrades to `fallbackAnalysis()`.
 */
export class EnrichmentClient implements Enricher {
  private readonly generators = new Map<string, TextGenerator>();

  constructor(
    private readonly createGenerator: GeneratorFactory,
    private readonly logger: Logger,
  ) {}

  async analyze(text: string, apiKey: string): Promise<AnalysisResult> {
    if (!apiKey) {
      this.logger.warn("No inference API key configured, using fallback analysis");
      return fallbackAnalysis();
    }

    try {
      const generate = this.generatorFor(apiKey);
      const raw = await generate(plannerUserPrompt(text));
      const analysis = parseAnalysis(raw);
      this.logger.info("Analysis complete", {
        emotion: analysis.emotion,
        sentimentScore: analysis.sentimentScore,
        days: analysis.weeklyPlan.length,
      });
      return analysis;
    } catch (error) {
      this.logger.error("Inference call failed, using fallback analysis", { error });
      return fallbackAnalysis();
    }
  }

  private generatorFor(apiKey: string): TextGenerator {
    let generator = this.generators.get(apiKey);
    if (!generator) {
      generator = this.createGenerator(apiKey);
      this.generators.set(apiKey, generator);
    }
    return generator;
  }
}
