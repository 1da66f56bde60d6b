import type {
  GresConfigDocument,
  GresEntry,
  SlurmConfigDocument,
  SlurmOptionMap,
  SlurmOptionValue,
  SlurmOptions,
} from "./types.js";

export function emptySlurmConfig(): SlurmConfigDocument {
  return { options: {}, nodes: {}, downNodes: [], partitions: {} };
}

function formatMap(map: SlurmOptionMap): string {
  return Object.entries(map)
    .map(([key, value]) => (value === true ? key : `${key}=${value}`))
    .join(",");
}

function formatValue(value: SlurmOptionValue): string {
  if (Array.isArray(value)) {
    return value.join(",");
  }
  if (typeof value === "object") {
    return formatMap(value);
  }
  return value;
}

function quoteIfNeeded(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value;
  }
  if (value === "" || /\s/.test(value)) {
    return `"${value.replace(/"/g, '\\"')}"`;
  }
  return value;
}

function formatPair(key: string, value: SlurmOptionValue): string {
  return `${key}=${quoteIfNeeded(formatValue(value))}`;
}

function formatPairs(options: SlurmOptions): string[] {
  return Object.entries(options).map(([key, value]) => formatPair(key, value));
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function renderSlurmConfig(doc: SlurmConfigDocument): string {
  const lines: string[] = [];

  lines.push(...formatPairs(doc.options));

  for (const name of Object.keys(doc.nodes).sort(byName)) {
    lines.push([formatPair("NodeName", name), ...formatPairs(doc.nodes[name] ?? {})].join(" "));
  }

  for (const entry of doc.downNodes) {
    if (entry.nodes.length === 0) {
      continue;
    }
    lines.push(
      [
        formatPair("DownNodes", entry.nodes),
        formatPair("State", entry.state),
        formatPair("Reason", entry.reason),
      ].join(" "),
    );
  }

  for (const name of Object.keys(doc.partitions).sort(byName)) {
    lines.push(
      [formatPair("PartitionName", name), ...formatPairs(doc.partitions[name] ?? {})].join(" "),
    );
  }

  return `${lines.join("\n")}\n`;
}

/** Render a flat `Key=Value` file such as cgroup.conf or slurmdbd.conf. */
export function renderKeyValueConfig(options: SlurmOptions): string {
  return `${formatPairs(options).join("\n")}\n`;
}

export function renderGresConfig(doc: GresConfigDocument): string {
  const lines: string[] = [];
  for (const node of Object.keys(doc.nodes).sort(byName)) {
    for (const entry of doc.nodes[node] ?? []) {
      lines.push(
        [
          formatPair("NodeName", node),
          formatPair("Name", entry.Name),
          formatPair("Type", entry.Type),
          formatPair("File", entry.File),
        ].join(" "),
      );
    }
  }
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

/** Split a line on whitespace, keeping double-quoted runs together. */
export function tokenizeLine(line: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const char = line[i] ?? "";
    if (char === "\\" && quoted && line[i + 1] === '"') {
      current += '\\"';
      i++;
      continue;
    }
    if (char === '"') {
      quoted = !quoted;
      current += char;
      continue;
    }
    if (!quoted && /\s/.test(char)) {
      if (current.length > 0) {
        tokens.push(current);
        current = "";
      }
      continue;
    }
    current += char;
  }
  if (quoted) {
    throw new Error(`Unterminated quote in line: ${line}`);
  }
  if (current.length > 0) {
    tokens.push(current);
  }
  return tokens;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\"/g, '"');
  }
  return value;
}

function splitPair(token: string, lineNumber: number): [string, string] {
  const idx = token.indexOf("=");
  if (idx <= 0) {
    throw new Error(`line ${lineNumber}: expected KEY=VALUE, got "${token}"`);
  }
  return [token.slice(0, idx), unquote(token.slice(idx + 1))];
}

function contentLines(text: string): Array<{ line: string; lineNumber: number }> {
  return text
    .split(/\r?\n/)
    .map((line, idx) => ({ line: line.trim(), lineNumber: idx + 1 }))
    .filter((entry) => entry.line.length > 0 && !entry.line.startsWith("#"));
}

/**
 * Parse slurm.conf text. Option values come back as strings; rendering the
 * result reproduces the same lines.
 */
export function parseSlurmConfig(text: string): SlurmConfigDocument {
  const doc = emptySlurmConfig();

  for (const { line, lineNumber } of contentLines(text)) {
    const pairs = tokenizeLine(line).map((token) => splitPair(token, lineNumber));
    const [head, ...rest] = pairs;
    if (!head) {
      continue;
    }
    const [key, value] = head;
    const tail: SlurmOptions = Object.fromEntries(rest);

    if (key === "NodeName") {
      doc.nodes[value] = tail;
    } else if (key === "PartitionName") {
      doc.partitions[value] = tail;
    } else if (key === "DownNodes") {
      const state = tail.State;
      const reason = tail.Reason;
      doc.downNodes.push({
        nodes: value.split(",").filter((name) => name.length > 0),
        state: typeof state === "string" ? state : "DOWN",
        reason: typeof reason === "string" ? reason : "",
      });
    } else {
      for (const [optionKey, optionValue] of pairs) {
        doc.options[optionKey] = optionValue;
      }
    }
  }

  return doc;
}

export function parseKeyValueConfig(text: string): SlurmOptions {
  const options: SlurmOptions = {};
  for (const { line, lineNumber } of contentLines(text)) {
    for (const token of tokenizeLine(line)) {
      const [key, value] = splitPair(token, lineNumber);
      options[key] = value;
    }
  }
  return options;
}

export function parseGresConfig(text: string): GresConfigDocument {
  const doc: GresConfigDocument = { nodes: {} };
  for (const { line, lineNumber } of contentLines(text)) {
    const fields = Object.fromEntries(
      tokenizeLine(line).map((token) => splitPair(token, lineNumber)),
    );
    const node = fields.NodeName;
    if (!node) {
      continue;
    }
    const entry: GresEntry = {
      Name: fields.Name ?? "",
      Type: fields.Type ?? "",
      File: fields.File ?? "",
    };
    doc.nodes[node] = [...(doc.nodes[node] ?? []), entry];
  }
  return doc;
}

/** Names listed on DownNodes lines whose reason marks them as new. */
export function newNodeNames(doc: SlurmConfigDocument, reason: string): string[] {
  const names = doc.downNodes
    .filter((entry) => entry.reason === reason)
    .flatMap((entry) => entry.nodes);
  return Array.from(new Set(names)).sort(byName);
}
