import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";

export type NdjsonLine<T> = {
  lineNumber: number;
  value: T;
};

export type NdjsonInvalidLine = {
  lineNumber: number;
  reason: string;
};

/**
 * Reads an NDJSON file line by line. Blank lines are ignored; lines that fail
 * to parse or that the mapper rejects are reported through `onInvalid`.
 */
export async function readNdjsonFile<T>(
  filePath: string,
  mapper: (value: unknown) => T | null,
  onInvalid?: (line: NdjsonInvalidLine) => void,
): Promise<Array<NdjsonLine<T>>> {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  const stream = fs.createReadStream(filePath, "utf8");
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  const entries: Array<NdjsonLine<T>> = [];
  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber += 1;
    if (!line.trim()) {
      continue;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      onInvalid?.({ lineNumber, reason: `invalid json: ${String(err)}` });
      continue;
    }
    const mapped = mapper(parsed);
    if (mapped === null) {
      onInvalid?.({ lineNumber, reason: "rejected by mapper" });
      continue;
    }
    entries.push({ lineNumber, value: mapped });
  }
  return entries;
}

export async function appendNdjson(filePath: string, values: unknown[]): Promise<void> {
  if (values.length === 0) {
    return;
  }
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
  const lines = values.map((entry) => JSON.stringify(entry)).join("\n");
  await fs.promises.appendFile(filePath, `${lines}\n`, "utf8");
}
