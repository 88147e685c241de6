import fs from "fs";
import { isRecord } from "../utils/json";

export type TemplatePools = {
  templates: string[];
  entities: string[];
  statuses: string[];
  actions: string[];
  rewards: string[];
  amountRange: [number, number];
};

function stringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(`template pools: "${field}" must be a non-empty array`);
  }
  return value.map((item) => String(item));
}

export function parseTemplatePools(raw: unknown): TemplatePools {
  if (!isRecord(raw)) throw new Error("template pools: expected a JSON object");
  const range = raw.amountRange;
  const amountRange: [number, number] =
    Array.isArray(range) && range.length === 2 && typeof range[0] === "number" && typeof range[1] === "number"
      ? [range[0], range[1]]
      : [500, 50000];
  return {
    templates: stringList(raw.templates, "templates"),
    entities: stringList(raw.entities, "entities"),
    statuses: stringList(raw.statuses, "statuses"),
    actions: stringList(raw.actions, "actions"),
    rewards: stringList(raw.rewards, "rewards"),
    amountRange
  };
}

export function loadTemplatePools(file: string): TemplatePools {
  return parseTemplatePools(JSON.parse(fs.readFileSync(file, "utf-8")));
}

function pick<T>(items: T[], random: () => number): T {
  return items[Math.floor(random() * items.length) % items.length];
}

export function fillTemplate(template: string, pools: TemplatePools, random: () => number): string {
  const [min, max] = pools.amountRange;
  const values: Record<string, string> = {
    entity: pick(pools.entities, random),
    status: pick(pools.statuses, random),
    action: pick(pools.actions, random),
    reward: pick(pools.rewards, random),
    amount: String(min + Math.floor(random() * (max - min + 1)))
  };
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function generateSentences(n: number, pools: TemplatePools, random: () => number = Math.random): string[] {
  const sentences: string[] = [];
  for (let i = 0; i < n; i += 1) {
    sentences.push(fillTemplate(pick(pools.templates, random), pools, random));
  }
  return sentences;
}
