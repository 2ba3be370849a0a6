import { ClassTarget } from "./types.js";

const SEPARATOR = "|";

function normalizePart(value: string): string {
  return value.trim().replace(/\s+/g, " ").toUpperCase();
}

export function normalizeTarget(target: ClassTarget): ClassTarget {
  return {
    subject: normalizePart(target.subject),
    catalogNumber: normalizePart(target.catalogNumber),
    term: normalizePart(target.term),
  };
}

export function makeClassKey(target: ClassTarget): string {
  const { subject, catalogNumber, term } = normalizeTarget(target);
  if (!subject || !catalogNumber || !term) {
    throw new Error(`Incomplete class identity: "${target.subject}" "${target.catalogNumber}" "${target.term}"`);
  }
  return [term, subject, catalogNumber].join(SEPARATOR);
}

export function parseClassKey(classKey: string): ClassTarget {
  const parts = classKey.split(SEPARATOR);
  if (parts.length !== 3) {
    throw new Error(`Malformed class key: ${classKey}`);
  }
  const [term, subject, catalogNumber] = parts;
  return { term, subject, catalogNumber };
}

/**
 * Parses "COM SCI 111" style input. The last token is the catalog number, everything
 * before it is the subject (subjects may contain spaces).
 */
export function parseClassSpec(spec: string, term: string): ClassTarget | null {
  const tokens = spec.trim().split(/\s+/).filter(Boolean);
  if (tokens.length < 2) return null;
  const catalogNumber = tokens[tokens.length - 1];
  const subject = tokens.slice(0, -1).join(" ");
  return normalizeTarget({ subject, catalogNumber, term });
}

export function formatClass(target: ClassTarget): string {
  return `${target.subject} ${target.catalogNumber}`;
}
