// Identifier lexical grammar and kind classification

import type { IdentifierKind, KeyScheme } from "./model.js";

export const IDENTIFIER_KINDS: readonly IdentifierKind[] = [
  "stakeholder",
  "requirement",
  "component",
  "decision",
  "scenario",
  "test",
];

// Global flag: matchAll requires it.
export const ID_PATTERNS: Readonly<Record<IdentifierKind, RegExp>> = {
  stakeholder: /StR-\d{3}/g,
  requirement: /REQ-(?:F|NF)-\d{3}/g,
  decision: /ADR-\d{3}/g,
  component: /ARC-C-\d{3}/g,
  scenario: /QA-SC-\d{3}/g,
  test: /TEST-[A-Z0-9-]+/g,
};

// Prefix used both for classification and for the "prefix" metric keys.
const KIND_PREFIX: Readonly<Record<IdentifierKind, string>> = {
  stakeholder: "StR",
  requirement: "REQ",
  component: "ARC",
  decision: "ADR",
  scenario: "QA",
  test: "TEST",
};

/**
 * Classify an identifier by its prefix. Works on any id string, including
 * ones read from an index that were never matched against ID_PATTERNS.
 */
export function kindOf(id: string): IdentifierKind | undefined {
  for (const kind of IDENTIFIER_KINDS) {
    if (id.startsWith(`${KIND_PREFIX[kind]}-`)) return kind;
  }
  return undefined;
}

export function groupKey(kind: IdentifierKind, scheme: KeyScheme): string {
  return scheme === "prefix" ? KIND_PREFIX[kind] : kind;
}

export function emptyGroups(): Record<IdentifierKind, Set<string>> {
  return {
    stakeholder: new Set(),
    requirement: new Set(),
    component: new Set(),
    decision: new Set(),
    scenario: new Set(),
    test: new Set(),
  };
}

export function findIdentifiers(text: string, kind: IdentifierKind): string[] {
  return Array.from(text.matchAll(ID_PATTERNS[kind]), (m) => m[0]);
}
