import { readFileSync } from "fs";
import Ajv2020 from "ajv/dist/2020";
import addFormats from "ajv-formats";
import type { ErrorObject, SchemaObject } from "ajv";

/**
 * Shared validator for the JSON Schemas under `schemas/`.
 * ipv4/ipv6 formats come from ajv-formats.
 */
export const ajv = new Ajv2020({ allErrors: true, strict: false });
addFormats(ajv);

export function readSchema(fileName: string): SchemaObject {
  const url = new URL(`../../schemas/${fileName}`, import.meta.url);
  return JSON.parse(readFileSync(url, "utf8"));
}

/** Flattens ajv errors into "path: message" lines. */
export function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) return [];

  // anyOf over formats reports each branch separately; fold them into one line
  const formats = new Map<string, string[]>();
  for (const err of errors) {
    if (err.keyword !== "format") continue;
    const list = formats.get(err.instancePath) ?? [];
    list.push(`"${String(err.params.format)}"`);
    formats.set(err.instancePath, list);
  }

  const lines = new Set<string>();
  for (const err of errors) {
    const path = err.instancePath || "/";
    if (err.keyword === "format") continue;
    const branches = formats.get(err.instancePath);
    if (err.keyword === "anyOf" && branches) {
      lines.add(`${path}: must match format ${branches.join(" or ")}`);
      continue;
    }
    lines.add(`${path}: ${err.message ?? "is invalid"}`);
  }
  return [...lines];
}
