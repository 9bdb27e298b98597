import {
  DIAGNOSIS_FAILED,
  FALLBACK_INTAKE_QUESTIONS,
  SERVICE_QUESTIONS,
  createAdvisor,
  parseConfidence,
} from "@/server/ai/advisor";
import { FakeCompleter, scriptedCompleter } from "../helpers/fakes";

const failing = () =>
  new FakeCompleter(() => {
    throw new Error("rate limited");
  });

describe("parseConfidence", () => {
  it.each([
    ["0.8", 0.8],
    [" 0.25 ", 0.25],
    ["1.7", 1],
    ["-0.2", 0],
    ["high", 0.5],
    ["0.8 confident", 0.5],
    ["", 0.5],
  ])("reads %p as %p", (raw, expected) => {
    expect(parseConfidence(raw)).toBe(expected);
  });
});

describe("analyzeIssue", () => {
  it("asks the chat model for clarifying questions", async () => {
    const completer = scriptedCompleter({ intake: "  When did it start?  " });
    const advisor = createAdvisor({ completer, brandName: "Vet-Eye" });

    expect(await advisor.analyzeIssue("Clicking noise")).toBe("When did it start?");
    expect(completer.calls[0]).toMatchObject({
      kind: "chat",
      user: "Device problem: Clicking noise",
      temperature: 0.5,
      maxTokens: 500,
    });
    expect(completer.calls[0].system).toContain("Vet-Eye veterinary ultrasound scanners");
  });

  it("falls back to fixed questions on an empty answer or a failure", async () => {
    const empty = createAdvisor({ completer: scriptedCompleter({ intake: "   " }), brandName: "Vet-Eye" });
    const broken = createAdvisor({ completer: failing(), brandName: "Vet-Eye" });

    expect(await empty.analyzeIssue("Clicking noise")).toBe(FALLBACK_INTAKE_QUESTIONS);
    expect(await broken.analyzeIssue("Clicking noise")).toBe(FALLBACK_INTAKE_QUESTIONS);
  });
});

describe("analyzeProblemWithKnowledge", () => {
  it("writes a solution and scores it", async () => {
    const completer = scriptedCompleter({ diagnosis: "Reseat the probe.", confidence: "0.9" });
    const advisor = createAdvisor({ completer, brandName: "Vet-Eye" });

    const diagnosis = await advisor.analyzeProblemWithKnowledge("VE-Pro 2", "No image", [
      { type: "troubleshooting", content: "Problem: No image\n\nSolution: Check gain", relevance: 0.5 },
    ]);

    expect(diagnosis).toEqual({ solution: "Reseat the probe.", confidenceScore: 0.9 });
    expect(completer.calls).toHaveLength(2);
    expect(completer.calls[0]).toMatchObject({ kind: "chat", temperature: 0.3, maxTokens: 1000 });
    expect(completer.calls[0].user).toContain("Device model: VE-Pro 2\nReported problem: No image");
    expect(completer.calls[0].user).toContain("Solution 1 (Relevance: 50%, Type: troubleshooting):");
    expect(completer.calls[1]).toMatchObject({ kind: "classifier", temperature: 0.1, maxTokens: 10 });
    expect(completer.calls[1].user).toContain('The generated answer: "Reseat the probe."');
  });

  it("reports a failed diagnosis with a low score", async () => {
    const advisor = createAdvisor({ completer: failing(), brandName: "Vet-Eye" });

    expect(await advisor.analyzeProblemWithKnowledge("VE-Pro 2", "No image", [])).toEqual({
      solution: DIAGNOSIS_FAILED,
      confidenceScore: 0.1,
    });
  });
});

describe("isOnTopic", () => {
  it("answers off-topic messages with a fixed reply", async () => {
    const advisor = createAdvisor({ completer: scriptedCompleter({ topic: "off_topic." }), brandName: "Vet-Eye" });

    expect(await advisor.isOnTopic("What's the weather?")).toEqual({
      isOnTopic: false,
      response: "Sorry, I can only answer questions about Vet-Eye devices.",
    });
  });

  it("accepts on-topic messages", async () => {
    const completer = scriptedCompleter({ topic: "ON_TOPIC" });
    const advisor = createAdvisor({ completer, brandName: "Vet-Eye" });

    expect(await advisor.isOnTopic("The probe is not detected")).toEqual({ isOnTopic: true });
    expect(completer.calls[0]).toMatchObject({ kind: "classifier", temperature: 0, maxTokens: 5 });
  });

  it("lets the message through when the check fails", async () => {
    const advisor = createAdvisor({ completer: failing(), brandName: "Vet-Eye" });
    expect(await advisor.isOnTopic("anything")).toEqual({ isOnTopic: true });
  });
});

describe("getServiceQuestions", () => {
  it("returns a fresh copy of the questionnaire", () => {
    const advisor = createAdvisor({ completer: scriptedCompleter(), brandName: "Vet-Eye" });

    const questions = advisor.getServiceQuestions();
    questions.push("extra");

    expect(advisor.getServiceQuestions()).toEqual([...SERVICE_QUESTIONS]);
    expect(advisor.getServiceQuestions()).toHaveLength(7);
  });
});
