const HYPHENATED_END_RE = /[A-Za-z]{3,}-$/;

function startsLowercase(line: string): boolean {
  const first = line.charAt(0);
  return first !== "" && first !== first.toUpperCase() && first === first.toLowerCase();
}

/**
 * Rejoin words split across line ends. A line ending in a 3+ letter word and a
 * hyphen is held: a lowercase continuation drops the hyphen, anything else
 * keeps it. A held line at end of input loses its hyphen.
 */
export function repairHyphenation(lines: readonly string[]): string[] {
  const result: string[] = [];
  let pending: string | null = null;

  for (const raw of lines) {
    const line = raw.trimEnd();
    if (pending !== null) {
      result.push(startsLowercase(line) ? pending + line : `${pending}-${line}`);
      pending = null;
      continue;
    }
    if (HYPHENATED_END_RE.test(line)) {
      pending = line.slice(0, -1);
    } else {
      result.push(line);
    }
  }
  if (pending !== null) result.push(pending);
  return result;
}
