import type { MessageTone } from "@polity/schemas";

const ACCUSATION_PATTERNS: RegExp[] = [
  /\bwhy did you\b/i,
  /\bhow dare\b/i,
  /\bhow could you\b/i,
  /\byou lied\b/i,
  /\byou always\b/i,
  /\bshame on you\b/i,
  /\byour fault\b/i,
];

const NEGATIVE_STEMS = [
  "betray", "traitor", "liar", "lying", "selfish", "useless", "hate", "threat",
  "coward", "pathetic", "stupid", "sabotag", "greed", "disgrac", "fool", "blame",
];

const FRIENDLY_STEMS = [
  "thank", "grateful", "appreciat", "together", "cooperat", "collaborat",
  "help", "support", "ally", "allies", "friend", "trust", "welcome", "share",
];

export interface ToneAnalysis {
  tone: MessageTone;
  hostile: string[];
  friendly: string[];
}

function stemMatches(text: string, stems: readonly string[]): string[] {
  return stems.filter((stem) => new RegExp(`\\b${stem}`, "i").test(text));
}

function isShouting(text: string): boolean {
  const letters = text.match(/[a-z]/gi) ?? [];
  if (letters.length <= 5) return false;
  const upper = letters.filter((ch) => ch === ch.toUpperCase()).length;
  return upper > letters.length / 2;
}

/**
 * Keyword heuristic. Total and deterministic; hostile signals take precedence
 * over friendly ones.
 */
export function analyzeTone(text: string): ToneAnalysis {
  const hostile: string[] = [];
  for (const pattern of ACCUSATION_PATTERNS) {
    const match = pattern.exec(text);
    if (match) hostile.push(`accusation:${match[0].toLowerCase()}`);
  }
  if (isShouting(text)) hostile.push("shouting");
  for (const stem of stemMatches(text, NEGATIVE_STEMS)) hostile.push(`negative:${stem}`);

  const friendly = stemMatches(text, FRIENDLY_STEMS).map((stem) => `positive:${stem}`);

  const tone: MessageTone = hostile.length > 0 ? "hostile" : friendly.length > 0 ? "friendly" : "neutral";
  return { tone, hostile, friendly };
}

export function classifyTone(text: string): MessageTone {
  return analyzeTone(text).tone;
}
