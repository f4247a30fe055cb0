import { z } from "zod";
import templateData from "./canvasTemplates.json";

export const CANVAS_TEMPLATES = [
  "happy",
  "excited",
  "hopeful",
  "anxious",
  "stressed",
  "sad",
  "angry",
  "neutral",
  "tired",
  "grateful",
] as const;

export type CanvasTemplate = (typeof CANVAS_TEMPLATES)[number];

export const DEFAULT_TEMPLATE: CanvasTemplate = "neutral";

const EMOTION_ALIASES: ReadonlyMap<string, CanvasTemplate> = new Map([
  ["joyful", "happy"],
  ["elated", "excited"],
  ["enthusiastic", "excited"],
  ["optimistic", "hopeful"],
  ["worried", "anxious"],
  ["nervous", "anxious"],
  ["overwhelmed", "stressed"],
  ["depressed", "sad"],
  ["melancholic", "sad"],
  ["furious", "angry"],
  ["irritated", "angry"],
  ["exhausted", "tired"],
  ["fatigued", "tired"],
  ["thankful", "grateful"],
  ["appreciative", "grateful"],
]);

const templateLines = z.array(z.string()).min(1);
const TemplatesSchema = z.object({
  happy: templateLines,
  excited: templateLines,
  hopeful: templateLines,
  anxious: templateLines,
  stressed: templateLines,
  sad: templateLines,
  angry: templateLines,
  neutral: templateLines,
  tired: templateLines,
  grateful: templateLines,
});

const TEMPLATES: Record<CanvasTemplate, string[]> = TemplatesSchema.parse(templateData);

const INNER_WIDTH = 38;

function isCanvasTemplate(label: string): label is CanvasTemplate {
  return CANVAS_TEMPLATES.some((template) => template === label);
}

/**
 * Maps any emotion label to exactly one template: aliases first, then the
 * canonical names, then the default.
 */
export function resolveTemplate(emotion: string): CanvasTemplate {
  const label = emotion.trim().toLowerCase();
  const alias = EMOTION_ALIASES.get(label);
  if (alias) return alias;
  return isCanvasTemplate(label) ? label : DEFAULT_TEMPLATE;
}

function centered(text: string): string {
  const content = text.length > INNER_WIDTH ? text.slice(0, INNER_WIDTH) : text;
  const left = Math.floor((INNER_WIDTH - content.length) / 2);
  return `║${" ".repeat(left)}${content}`.padEnd(INNER_WIDTH + 1) + "║";
}

function leftAligned(text: string): string {
  return `║  ${text}`.padEnd(INNER_WIDTH + 1) + "║";
}

function frame(lines: string[]): string[] {
  const border = "═".repeat(INNER_WIDTH);
  return [`╔${border}╗`, ...lines, `╚${border}╝`];
}

export function formatGeneratedAt(generatedAt: Date): string {
  return `${generatedAt.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export interface Canvas {
  template: CanvasTemplate;
  body: string;
}

/**
 * Renders the emotion canvas for a record. Output depends only on the
 * arguments.
 */
export function generateCanvas(emotion: string, recordId: string, generatedAt: Date): Canvas {
  const template = resolveTemplate(emotion);
  const art = frame(TEMPLATES[template].map(centered));
  const footer = frame([
    leftAligned("Emotion Canvas"),
    leftAligned(`ID: ${recordId.slice(0, 8)}`),
    leftAligned(`Generated: ${formatGeneratedAt(generatedAt)}`),
  ]);
  return { template, body: [...art, ...footer].join("\n") + "\n" };
}
