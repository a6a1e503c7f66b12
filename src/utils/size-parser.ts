export type ParsedSize =
  | { kind: 'bytes'; bytes: number }
  | { kind: 'unparseable'; raw: unknown };

const UNIT_POWERS: Record<string, number> = {
  B: 0,
  KB: 1,
  MB: 2,
  GB: 3,
  TB: 4,
};

type SizePattern = {
  regex: RegExp;
  toBytes: (match: RegExpMatchArray) => number;
};

function digitsToNumber(value: string): number {
  return Number(value.replace(/,/g, ''));
}

// Order matters: "1.2 GB (1,288,490,189 bytes)" must resolve through the exact byte count
const PATTERNS: SizePattern[] = [
  {
    regex: /\(\s*([\d,]+)\s*bytes?\s*\)/i,
    toBytes: (m) => digitsToNumber(m[1]),
  },
  {
    regex: /^([\d,]+)\s*bytes?$/i,
    toBytes: (m) => digitsToNumber(m[1]),
  },
  {
    regex: /^(\d+(?:\.\d+)?)\s*(B|KB|MB|GB|TB)$/i,
    toBytes: (m) => Math.round(Number(m[1]) * Math.pow(1024, UNIT_POWERS[m[2].toUpperCase()])),
  },
  {
    regex: /^(\d+)$/,
    toBytes: (m) => Number(m[1]),
  },
];

export function parseSize(value: unknown): ParsedSize {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0
      ? { kind: 'bytes', bytes: Math.round(value) }
      : { kind: 'unparseable', raw: value };
  }
  if (typeof value !== 'string') return { kind: 'unparseable', raw: value };

  const trimmed = value.trim();
  for (const pattern of PATTERNS) {
    const match = trimmed.match(pattern.regex);
    if (!match) continue;
    const bytes = pattern.toBytes(match);
    if (Number.isSafeInteger(bytes) && bytes >= 0) return { kind: 'bytes', bytes };
  }
  return { kind: 'unparseable', raw: value };
}

