import { SlugCollisionError } from "../errors";

const MAX_COLLISION_ATTEMPTS = 1000;
const QUOTES_RE = /['"‘’“”]/g;
const NUMERIC_PREFIX_RE = /^\d+-/;

// Letters NFKD leaves whole
const TRANSLITERATIONS: Record<string, string> = {
  ß: "ss",
  æ: "ae",
  œ: "oe",
  ø: "o",
  ł: "l",
  đ: "d",
  ð: "d",
  þ: "th",
  ı: "i",
};
const TRANSLITERATE_RE = new RegExp(`[${Object.keys(TRANSLITERATIONS).join("")}]`, "g");

/**
 * Text to URL slug: quote-stripped, accents folded to ASCII,
 * non-alphanumeric runs collapsed to single hyphens.
 */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(QUOTES_RE, "")
    .replace(TRANSLITERATE_RE, (ch) => TRANSLITERATIONS[ch] ?? "")
    .normalize("NFKD")
    .replace(/\p{M}+/gu, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function formatPrefix(index: number, width: number): string {
  return String(index).padStart(width, "0");
}

export function hasNumericPrefix(slug: string): boolean {
  return NUMERIC_PREFIX_RE.test(slug);
}

/**
 * Document-scoped slug allocator. Repeats are counted on the base text slug,
 * so the Nth occurrence of the same text gets a `-N` suffix regardless of
 * any prefix. Create one per document.
 */
export class SlugAllocator {
  private readonly repeats = new Map<string, number>();
  private readonly taken = new Set<string>();

  constructor(private readonly width = 2) {}

  allocate(text: string, prefixIndex?: number): string {
    const base = slugify(text);
    const seen = this.repeats.get(base) ?? 0;
    this.repeats.set(base, seen + 1);

    let n = seen + 1;
    for (let attempt = 0; attempt < MAX_COLLISION_ATTEMPTS; attempt++) {
      const candidate = this.withPrefix(withSuffix(base, n), prefixIndex);
      if (!this.taken.has(candidate)) {
        this.taken.add(candidate);
        return candidate;
      }
      n++;
    }
    throw new SlugCollisionError(base, MAX_COLLISION_ATTEMPTS);
  }

  private withPrefix(slug: string, prefixIndex?: number): string {
    return prefixIndex === undefined
      ? slug
      : `${formatPrefix(prefixIndex, this.width)}-${slug}`;
  }
}

function withSuffix(base: string, n: number): string {
  if (n === 1) return base;
  return base === "" ? String(n) : `${base}-${n}`;
}
