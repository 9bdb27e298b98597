import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  findSolution,
  formatSolutionsForPrompt,
  loadKnowledgeBase,
  type KnowledgeBase,
  type TroubleshootingEntry,
} from "@/server/knowledge/knowledge-base";
import { similarityRatio } from "@/server/knowledge/similarity";
import { logger } from "@/lib/logger";

const emptyKb = (): KnowledgeBase => ({ documents: [], troubleshooting: [], usageGuides: [] });

describe("loadKnowledgeBase", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "kb-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("loads the bundled data and unwraps nested documents", async () => {
    const kb = await loadKnowledgeBase({ dataDir: path.join(__dirname, "..", "..", "data") });

    expect(kb.documents).toHaveLength(3);
    expect(kb.documents[1].content.startsWith("Battery:")).toBe(true);
    expect(kb.troubleshooting).toHaveLength(6);
    expect(kb.usageGuides).toHaveLength(2);
  });

  it("scores long troubleshooting texts without their most frequent characters", async () => {
    const kb = await loadKnowledgeBase({ dataDir: path.join(__dirname, "..", "..", "data") });
    const entry = kb.troubleshooting[0];
    const content = `${entry.problem} ${entry.solution}`;

    expect(content.length).toBeGreaterThanOrEqual(200);
    expect(similarityRatio("the screen stays black after I turn the device on", content)).toBeCloseTo(0.020906, 5);
  });

  it("returns empty collections when the files are missing", async () => {
    const kb = await loadKnowledgeBase({ dataDir: path.join(tmpDir, "nowhere") });
    expect(kb).toEqual(emptyKb());
  });

  it("skips unreadable files and invalid entries", async () => {
    await fs.writeFile(path.join(tmpDir, "documents.json"), "{ not json");
    await fs.writeFile(
      path.join(tmpDir, "troubleshooting.json"),
      JSON.stringify([
        { problem: "Probe not detected", solution: "Reconnect the probe" },
        { problem: "Missing solution" },
        "text",
      ])
    );
    await fs.writeFile(path.join(tmpDir, "usage.json"), JSON.stringify({ title: "not a list" }));

    const kb = await loadKnowledgeBase({ dataDir: tmpDir });

    expect(kb.documents).toEqual([]);
    expect(kb.troubleshooting).toEqual([{ problem: "Probe not detected", solution: "Reconnect the probe" }]);
    expect(kb.usageGuides).toEqual([]);
  });

  it("logs read errors other than a missing file and carries on", async () => {
    await fs.mkdir(path.join(tmpDir, "documents.json"));
    const warn = jest.spyOn(logger, "warn");
    const error = jest.spyOn(logger, "error");

    try {
      const kb = await loadKnowledgeBase({ dataDir: tmpDir });

      expect(kb.documents).toEqual([]);
      expect(error).toHaveBeenCalledWith(expect.stringContaining(`Error reading ${path.join(tmpDir, "documents.json")}: EISDIR`));
      expect(warn).not.toHaveBeenCalledWith(`File not found: ${path.join(tmpDir, "documents.json")}`);
      expect(warn).toHaveBeenCalledWith(`File not found: ${path.join(tmpDir, "usage.json")}`);
    } finally {
      warn.mockRestore();
      error.mockRestore();
    }
  });

  it("drops empty nested document lists", async () => {
    await fs.writeFile(
      path.join(tmpDir, "documents.json"),
      JSON.stringify([[], [{ content: "First" }, { content: "Second" }]])
    );

    const kb = await loadKnowledgeBase({ dataDir: tmpDir });
    expect(kb.documents).toEqual([{ content: "First" }]);
  });
});

describe("findSolution", () => {
  const probeEntry: TroubleshootingEntry = {
    problem: "Probe not detected",
    solution: "Reconnect the probe",
    metadata: { device_model: "VE-Pro 2", keywords: ["probe", "detected"] },
  };
  const imageEntry: TroubleshootingEntry = {
    problem: "No image",
    solution: "Check gain",
    metadata: { keywords: ["image", "screen"], symptoms: [] },
  };

  it("scores troubleshooting entries for the device model", () => {
    const kb = { ...emptyKb(), troubleshooting: [probeEntry, imageEntry] };

    const result = findSolution(kb, "VE-Pro 2", "probe detected");

    expect(result.solutions[0]).toEqual({
      type: "troubleshooting",
      content: "Problem: Probe not detected\n\nSolution: Reconnect the probe",
      relevance: expect.any(Number),
    });
    expect(result.solutions[0].relevance).toBeGreaterThanOrEqual(0.4);
  });

  it("skips entries written for another model", () => {
    const kb = { ...emptyKb(), troubleshooting: [probeEntry, imageEntry] };

    const result = findSolution(kb, "VE-Mini", "image screen");

    expect(result.solutions).toHaveLength(1);
    expect(result.solutions[0].content).toBe("Problem: No image\n\nSolution: Check gain");
    expect(result.message).toBe("Found 1 potential solutions to this problem in the knowledge base.");
  });

  it("returns at most five solutions", () => {
    const entries = Array.from({ length: 7 }, (_, i) => ({
      problem: `Probe issue ${i}`,
      solution: "Reconnect the probe",
      metadata: { keywords: ["probe"] },
    }));
    const kb = { ...emptyKb(), troubleshooting: entries };

    const result = findSolution(kb, "VE-Mini", "probe");

    expect(result.solutions).toHaveLength(5);
    expect(result.message).toBe("Found 5 potential solutions to this problem in the knowledge base.");
  });

  it("falls back to documents and ignores their model when the device is unknown", () => {
    const kb = {
      ...emptyKb(),
      documents: [
        { content: "Battery lasts two hours", metadata: { device_model: "VE-Pro 2" } },
        { content: "Clean the probe after use" },
      ],
    };

    const result = findSolution(kb, "unknown", "battery hours");

    expect(result.solutions).toEqual([{ type: "document", content: "Battery lasts two hours", relevance: 1 }]);
    expect(result.message).toBe("Found 1 related entries in the technical documentation.");
  });

  it("filters documents by a known model", () => {
    const kb = {
      ...emptyKb(),
      documents: [{ content: "Battery lasts two hours", metadata: { device_model: "VE-Pro 2" } }],
    };

    const result = findSolution(kb, "VE-Mini", "battery hours");

    expect(result.solutions).toEqual([]);
    expect(result.message).toBe("No matches found in the knowledge base for this problem.");
  });

  it("does not consult documents once three troubleshooting entries match", () => {
    const entries = Array.from({ length: 3 }, (_, i) => ({
      problem: `Probe issue ${i}`,
      solution: "Reconnect",
      metadata: { keywords: ["probe"] },
    }));
    const kb = { ...emptyKb(), troubleshooting: entries, documents: [{ content: "probe" }] };

    const result = findSolution(kb, "VE-Mini", "probe");

    expect(result.solutions).toHaveLength(3);
    expect(result.solutions.every((s) => s.type === "troubleshooting")).toBe(true);
  });

  it("uses usage guides as the last resort", () => {
    const kb = { ...emptyKb(), usageGuides: [{ title: "Measurements", content: "freeze measure" }] };

    const result = findSolution(kb, "VE-Mini", "freeze measure");

    expect(result.solutions).toEqual([
      { type: "usage_guide", content: "Guide: Measurements\n\nfreeze measure", relevance: 1 },
    ]);
    expect(result.message).toBe("Found 1 related entries in the knowledge base.");
  });
});

describe("formatSolutionsForPrompt", () => {
  it("numbers the solutions with their relevance in percent", () => {
    expect(
      formatSolutionsForPrompt([
        { type: "document", content: "Battery lasts two hours", relevance: 0.456 },
        { type: "usage_guide", content: "Guide: Export", relevance: 0.2 },
      ])
    ).toBe(
      "Solution 1 (Relevance: 46%, Type: document):\nBattery lasts two hours\n\n" +
        "Solution 2 (Relevance: 20%, Type: usage_guide):\nGuide: Export\n"
    );
  });

  it("says so when nothing matched", () => {
    expect(formatSolutionsForPrompt([])).toBe("No exact matches in the knowledge base for this problem.");
  });
});
