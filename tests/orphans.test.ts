import { describe, it, expect } from "vitest";
import { countOrphans, detectOrphans, referencedByRequirements } from "../src/orphans.js";
import { extractIdentifiers } from "../src/extractor.js";
import { buildExplicitGraph, hasLinks, inferLinks } from "../src/linker.js";
import { groupIdentifiers } from "../src/coverage.js";

function heuristic(entries: Array<[string, string]>) {
  const corpus = new Map(entries);
  const extraction = extractIdentifiers(corpus);
  const graph = inferLinks(corpus, extraction);
  return { groups: extraction.ids, graph };
}

describe("detectOrphans", () => {
  it("reports a requirement linked to a decision as not orphaned", () => {
    const { groups, graph } = heuristic([["adr.md", "REQ-F-001 ADR-001"]]);
    const orphans = detectOrphans(groups, graph);
    expect(orphans.requirements_no_links).toEqual([]);
    expect(orphans.adrs_no_req).toEqual([]);
  });

  it("reports a scenario with no requirement nearby", () => {
    const { groups, graph } = heuristic([
      ["qa.md", "QA-SC-010 latency budget"],
      ["req.md", "REQ-F-001"],
    ]);
    const orphans = detectOrphans(groups, graph);
    expect(orphans.scenarios_no_req).toEqual(["QA-SC-010"]);
    expect(orphans.requirements_no_links).toEqual(["REQ-F-001"]);
  });

  it("sorts each category", () => {
    const { groups, graph } = heuristic([
      ["a.md", "ARC-C-003 ARC-C-001 ADR-010 ADR-002"],
    ]);
    const orphans = detectOrphans(groups, graph);
    expect(orphans.components_no_req).toEqual(["ARC-C-001", "ARC-C-003"]);
    expect(orphans.adrs_no_req).toEqual(["ADR-002", "ADR-010"]);
  });

  it("lists a requirement exactly when its forward set is empty", () => {
    const items = [
      { id: "REQ-F-001", references: ["ADR-001"] },
      { id: "REQ-F-002", references: [] },
      { id: "REQ-F-003", references: ["TEST-X"] },
    ];
    const graph = buildExplicitGraph(items);
    const groups = groupIdentifiers(items.map((i) => i.id));
    const orphans = detectOrphans(groups, graph);
    for (const id of groups.requirement) {
      expect(orphans.requirements_no_links.includes(id)).toBe(!hasLinks(graph, id));
    }
    expect(orphans.requirements_no_links).toEqual(["REQ-F-002"]);
  });

  it("ignores edges whose source is not a requirement", () => {
    const items = [
      { id: "QA-SC-001", references: ["ARC-C-001"] },
      { id: "ARC-C-001", references: [] },
    ];
    const graph = buildExplicitGraph(items);
    const orphans = detectOrphans(groupIdentifiers(items.map((i) => i.id)), graph);
    expect(orphans.components_no_req).toEqual(["ARC-C-001"]);
    expect(referencedByRequirements(graph).size).toBe(0);
  });

  it("returns empty categories for an empty corpus", () => {
    const { groups, graph } = heuristic([]);
    const orphans = detectOrphans(groups, graph);
    expect(countOrphans(orphans)).toBe(0);
    expect(orphans).toEqual({
      requirements_no_links: [],
      scenarios_no_req: [],
      components_no_req: [],
      adrs_no_req: [],
    });
  });
});
