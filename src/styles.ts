// Paper Script Pipeline - Podcast conversation styles
//
// A style fixes who the two hosts are (role, personality, stock reactions and
// turns of phrase), how the conversation moves, and the beats that open, break
// and close an episode. The table is read once from data/podcast-styles.json.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { UnknownStyleError } from "./errors.js";

export const DEFAULT_STYLE_ID = "layperson";

const STYLES_FILE = fileURLToPath(new URL("../data/podcast-styles.json", import.meta.url));

export interface HostProfile {
  /** snake_case role name, e.g. "curious_everyman". */
  role: string;
  personality: string;
  reactions: string[];
  /** Questions or explanations this host habitually reaches for. */
  patterns: string[];
  transitions: string[];
  agreements?: string[];
  oppositions?: string[];
}

export interface ConversationFlow {
  pace: string;
  transitionStyle: string;
  /** Share of turns, 0-1. */
  interruptions: number;
  followUpQuestions: number;
}

export interface PodcastStyle {
  id: string;
  name: string;
  description: string;
  useCase: string;
  hosts: [HostProfile, HostProfile];
  flow: ConversationFlow;
  /** Opening lines; `{topic}` stands for the paper's subject. */
  intro: string[];
  adBreak: string[];
  outro: string[];
}

// ─── Table parsing ──────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(where: string, expected: string): Error {
  return new Error(`Invalid podcast style table: ${where} must be ${expected}`);
}

function readString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== "string" || value.length === 0) throw invalid(`${where}.${key}`, "a non-empty string");
  return value;
}

function readStrings(record: Record<string, unknown>, key: string, where: string): string[] {
  const value = record[key];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw invalid(`${where}.${key}`, "an array of strings");
  }
  return value;
}

function readRate(record: Record<string, unknown>, key: string, where: string): number {
  const value = record[key];
  if (typeof value !== "number" || value < 0 || value > 1) throw invalid(`${where}.${key}`, "a number between 0 and 1");
  return value;
}

function parseHost(raw: unknown, where: string): HostProfile {
  if (!isRecord(raw)) throw invalid(where, "an object");
  return {
    role: readString(raw, "role", where),
    personality: readString(raw, "personality", where),
    reactions: readStrings(raw, "reactions", where),
    patterns: readStrings(raw, "patterns", where),
    transitions: readStrings(raw, "transitions", where),
    ...(raw.agreements !== undefined ? { agreements: readStrings(raw, "agreements", where) } : {}),
    ...(raw.oppositions !== undefined ? { oppositions: readStrings(raw, "oppositions", where) } : {}),
  };
}

function parseStyle(id: string, raw: unknown): PodcastStyle {
  if (!isRecord(raw)) throw invalid(id, "an object");
  const hosts = raw.hosts;
  if (!Array.isArray(hosts) || hosts.length !== 2) throw invalid(`${id}.hosts`, "a pair of hosts");
  const flow = raw.flow;
  if (!isRecord(flow)) throw invalid(`${id}.flow`, "an object");
  return {
    id,
    name: readString(raw, "name", id),
    description: readString(raw, "description", id),
    useCase: readString(raw, "useCase", id),
    hosts: [parseHost(hosts[0], `${id}.hosts[0]`), parseHost(hosts[1], `${id}.hosts[1]`)],
    flow: {
      pace: readString(flow, "pace", `${id}.flow`),
      transitionStyle: readString(flow, "transitionStyle", `${id}.flow`),
      interruptions: readRate(flow, "interruptions", `${id}.flow`),
      followUpQuestions: readRate(flow, "followUpQuestions", `${id}.flow`),
    },
    intro: readStrings(raw, "intro", id),
    adBreak: readStrings(raw, "adBreak", id),
    outro: readStrings(raw, "outro", id),
  };
}

/** Validates a decoded style table, keyed by style id, in file order. */
export function parseStyleTable(raw: unknown): ReadonlyMap<string, PodcastStyle> {
  if (!isRecord(raw)) throw invalid("root", "an object keyed by style id");
  const styles = new Map<string, PodcastStyle>();
  for (const [id, entry] of Object.entries(raw)) {
    styles.set(id, parseStyle(id, entry));
  }
  if (!styles.has(DEFAULT_STYLE_ID)) throw invalid(DEFAULT_STYLE_ID, "present");
  return styles;
}

let table: ReadonlyMap<string, PodcastStyle> | null = null;

function styleTable(): ReadonlyMap<string, PodcastStyle> {
  if (table === null) {
    const raw: unknown = JSON.parse(readFileSync(STYLES_FILE, "utf-8"));
    table = parseStyleTable(raw);
  }
  return table;
}

// ─── Lookup ─────────────────────────────────────────────────────────────────────

export function listStyles(): PodcastStyle[] {
  return [...styleTable().values()];
}

export function listStyleIds(): string[] {
  return [...styleTable().keys()];
}

export function isStyleId(id: string): boolean {
  return styleTable().has(id);
}

/** Throws UnknownStyleError for an id that is not in the table. */
export function getStyle(id: string = DEFAULT_STYLE_ID): PodcastStyle {
  const style = styleTable().get(id);
  if (!style) {
    throw new UnknownStyleError(id, listStyleIds());
  }
  return style;
}

// ─── Prompt fragments ───────────────────────────────────────────────────────────

/** "curious_everyman" → "curious everyman" */
export function formatRole(role: string): string {
  return role.replace(/_/g, " ");
}

function quoted(lines: readonly string[], limit: number): string {
  return lines
    .slice(0, limit)
    .map((line) => `"${line}"`)
    .join(" / ");
}

/** Host roles, personalities and conversation flow, as prompt lines. */
export function describeHostDynamics(style: PodcastStyle): string {
  const lines = [
    `Podcast style: ${style.name}. ${style.description}.`,
    `Audience: ${style.useCase}.`,
  ];
  style.hosts.forEach((host, i) => {
    lines.push(`Host ${i + 1} (${formatRole(host.role)}): ${host.personality}.`);
    lines.push(`  Typical reactions: ${quoted(host.reactions, 3)}`);
    lines.push(`  Often says: ${quoted(host.patterns, 2)}`);
    if (host.oppositions && host.oppositions.length > 0) {
      lines.push(`  Pushes back with: ${quoted(host.oppositions, 2)}`);
    }
  });
  lines.push(`Pace: ${style.flow.pace}; transitions: ${style.flow.transitionStyle}.`);
  return lines.join("\n");
}
