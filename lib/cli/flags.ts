export interface ParsedFlags {
  positional: string[];
  outDir?: string;
  configPath?: string;
  startPage?: number;
  endPage?: number;
  excludePages: number[];
  json: boolean;
}

function parsePageList(value: string): number[] {
  return value
    .split(",")
    .map((part) => parseInt(part.trim(), 10))
    .filter((n) => Number.isInteger(n) && n > 0);
}

export function parseFlags(args: readonly string[]): ParsedFlags {
  const positional: string[] = [];
  let outDir: string | undefined;
  let configPath: string | undefined;
  let startPage: number | undefined;
  let endPage: number | undefined;
  let excludePages: number[] = [];
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if ((arg === "--out" || arg === "-o") && args[i + 1]) {
      outDir = args[++i];
    } else if (arg === "--config" && args[i + 1]) {
      configPath = args[++i];
    } else if (arg === "--start-page" && args[i + 1]) {
      startPage = parseInt(args[++i], 10);
    } else if (arg === "--end-page" && args[i + 1]) {
      endPage = parseInt(args[++i], 10);
    } else if (arg === "--exclude-pages" && args[i + 1]) {
      excludePages = parsePageList(args[++i]);
    } else if (arg === "--json") {
      json = true;
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  return { positional, outDir, configPath, startPage, endPage, excludePages, json };
}
