export function escapeXml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'"
};

const ENTITY_AT = /&(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z][A-Za-z0-9]*);/y;

function decodeEntity(body: string): string | null {
  if (body.startsWith("#")) {
    const cp = body[1] === "x" ? Number.parseInt(body.slice(2), 16) : Number.parseInt(body.slice(1), 10);
    if (!Number.isFinite(cp) || cp <= 0 || cp > 0x10ffff) return null;
    return String.fromCodePoint(cp);
  }
  return Object.hasOwn(NAMED_ENTITIES, body) ? NAMED_ENTITIES[body] : null;
}

export type ScannedChar = {
  /** One UTF-16 code unit of decoded text. */
  ch: string;
  start: number;
  end: number;
};

/**
 * Decodes character data still carrying its entity references, keeping for every decoded code unit the raw
 * range it came from (`base` is the offset of `raw` in the document). Entities the document would need a DTD
 * for are kept literally.
 */
export function scanXmlText(raw: string, base: number): ScannedChar[] {
  const out: ScannedChar[] = [];
  let i = 0;
  while (i < raw.length) {
    if (raw[i] === "&") {
      ENTITY_AT.lastIndex = i;
      const m = ENTITY_AT.exec(raw);
      const decoded = m ? decodeEntity(m[1]) : null;
      if (m && decoded !== null) {
        const end = i + m[0].length;
        for (let k = 0; k < decoded.length; k++) out.push({ ch: decoded[k], start: base + i, end: base + end });
        i = end;
        continue;
      }
    }
    out.push({ ch: raw[i], start: base + i, end: base + i + 1 });
    i++;
  }
  return out;
}
