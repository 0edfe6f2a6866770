import { writeFile } from "node:fs/promises";
import path from "node:path";
import { FileWriteFailureError } from "./errors.js";
import type { RenderedReport } from "./renderReport.js";

export const OUTPUT_FORMATS = ["json", "text", "both"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface WriteOptions {
  format : OutputFormat;
  output?: string;
  /** stdout by default */
  write? : (chunk: string) => void;
}

export const JSON_SEPARATOR = "\n--- JSON ---\n";

/** "out/acme.json" → "out/acme"; a path without an extension is kept. */
export function outputBase(output: string): string {
  const { dir, name, ext } = path.parse(output);
  return ext ? path.join(dir, name) : output;
}

async function writeOne(file: string, content: string): Promise<void> {
  try {
    await writeFile(file, content, "utf8");
  } catch (e: unknown) {
    throw new FileWriteFailureError(file, { cause: e });
  }
}

/**
 * Writes <base>.json and/or <base>.txt when an output path is given, otherwise
 * prints to stdout. Resolves with the files written.
 */
export async function writeReport(rendered: RenderedReport, options: WriteOptions): Promise<string[]> {
  const { format, output } = options;
  const wantJson = format === "json" || format === "both";
  const wantText = format === "text" || format === "both";

  if (!output) {
    const write = options.write ?? ((chunk: string) => { process.stdout.write(chunk); });
    if (format === "both") {
      write(`${rendered.text}\n${JSON_SEPARATOR}\n${rendered.json}\n`);
    } else {
      write(`${wantJson ? rendered.json : rendered.text}\n`);
    }
    return [];
  }

  const base = outputBase(output);
  const written: string[] = [];
  if (wantJson) {
    await writeOne(`${base}.json`, rendered.json);
    written.push(`${base}.json`);
  }
  if (wantText) {
    await writeOne(`${base}.txt`, rendered.text);
    written.push(`${base}.txt`);
  }
  return written;
}
