import OpenAI from "openai";

let client: OpenAI | null = null;

export function hasOpenAIKey() {
  return !!(process.env.OPENAI_API_KEY || process.env.OPENAI_KEY);
}

export function ensureOpenAIKey() {
  if (!process.env.OPENAI_API_KEY && process.env.OPENAI_KEY) {
    process.env.OPENAI_API_KEY = process.env.OPENAI_KEY;
  }
  if (!process.env.OPENAI_API_KEY) {
    throw new Error("Missing OPENAI_API_KEY (alias: OPENAI_KEY)");
  }
}

export function getClient() {
  ensureOpenAIKey();
  if (!client) client = new OpenAI({ apiKey: process.env.OPENAI_API_KEY });
  return client;
}

type Price = { input: number; output: number };

// USD per million tokens.
const PRICES: Record<string, Price> = {
  "gpt-4.1-nano": { input: 0.1, output: 0.4 },
  "gpt-4.1-mini": { input: 0.4, output: 1.6 },
  "gpt-4.1": { input: 2, output: 8 },
  "gpt-4o-mini": { input: 0.15, output: 0.6 },
  "gpt-4o": { input: 2.5, output: 10 },
};

const FALLBACK_PRICE = PRICES["gpt-4.1-mini"];

/** Longest known model prefix wins, so dated snapshots price like their family. */
export function priceFor(model: string): Price {
  const key = Object.keys(PRICES)
    .filter((k) => model.startsWith(k))
    .sort((a, b) => b.length - a.length)[0];
  return key ? PRICES[key] : FALLBACK_PRICE;
}

export function estimateCost(model: string, inputTokens: number, outputTokens: number) {
  const price = priceFor(model);
  return (inputTokens * price.input + outputTokens * price.output) / 1_000_000;
}
