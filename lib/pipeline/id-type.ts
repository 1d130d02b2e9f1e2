import path from "node:path";

export type IdType = "drivers_license" | "passport" | "N/A";

interface DocumentRule {
  prefix: string;
  idType: IdType;
  /** Subtracted from the mean intensity before binarizing. */
  offset: number;
}

const DOCUMENT_RULES: DocumentRule[] = [
  { prefix: "license", idType: "drivers_license", offset: 20 },
  { prefix: "passport", idType: "passport", offset: 30 },
];

function ruleFor(fileName: string): DocumentRule | undefined {
  const lower = path.basename(fileName).toLowerCase();
  return DOCUMENT_RULES.find((r) => lower.startsWith(r.prefix));
}

export function detectIdType(fileName: string): IdType {
  return ruleFor(fileName)?.idType ?? "N/A";
}

export function binarizationOffset(fileName: string): number {
  return ruleFor(fileName)?.offset ?? 0;
}
