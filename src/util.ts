import fs from "fs";
import { fileURLToPath } from "url";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigValidationError, SiteInitError, type ErrorClass } from "./errors.js";

export function die(msg: string, kind: ErrorClass = SiteInitError): never {
  throw new kind(msg);
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

// Files under data/ sit one level above both src/ and dist/.
export function dataPath(name: string): string {
  return fileURLToPath(new URL(`../data/${name}`, import.meta.url));
}

export function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

// Sorted copy of a record's keys, for deterministic iteration.
export function sortedKeys(o: Record<string, unknown>): string[] {
  return Object.keys(o).sort();
}

// Unsigned decimal only: "-01" and "+1" are not numbers here.
export function parseInteger(s: string): number {
  return /^\d+$/.test(s.trim()) ? Number.parseInt(s.trim(), 10) : Number.NaN;
}

export function loadYaml(path: string): unknown {
  return yaml.load(readText(path));
}

// Schema failures become one ConfigValidationError listing every offending path.
export function parseInput<S extends z.ZodTypeAny>(schema: S, data: unknown, source: string): z.output<S> {
  const res = schema.safeParse(data);
  if (res.success) return res.data;
  const issues = res.error.issues.map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`);
  throw new ConfigValidationError(`invalid ${source}`, issues);
}
