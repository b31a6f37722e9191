import { describe, it, expect } from "vitest";
import {
  extractTag,
  extractAllTags,
  parseConfidenceValue,
  parseAgentResponse,
  parseSynthesis,
  parsePickOne,
  parseRank,
  type NumberedResponse,
} from "../consortium/parser.js";

describe("extractTag", () => {
  it("returns trimmed content of the first match", () => {
    expect(extractTag("<a> one </a><a>two</a>", "a")).toBe("one");
  });

  it("is case-insensitive and allows attributes", () => {
    expect(extractTag('<ANSWER lang="en">x</Answer>', "answer")).toBe("x");
  });

  it("spans multiple lines", () => {
    expect(extractTag("<answer>\nline 1\nline 2\n</answer>", "answer")).toBe("line 1\nline 2");
  });

  it("returns undefined when the tag is missing or unclosed", () => {
    expect(extractTag("no tags here", "answer")).toBeUndefined();
    expect(extractTag("<answer>never closed", "answer")).toBeUndefined();
  });

  it("extracts every occurrence in order", () => {
    expect(extractAllTags("<area>a</area> <area> b </area>", "area")).toEqual(["a", "b"]);
  });
});

describe("parseConfidenceValue", () => {
  it.each([
    ["0.85", 0.85],
    ["85", 0.85],
    ["85%", 0.85],
    [" 0.5 ", 0.5],
    [".5", 0.5],
    ["1", 1],
    ["100", 1],
    ["0", 0],
  ])("parses %s", (text, expected) => {
    expect(parseConfidenceValue(text)).toBeCloseTo(expected);
  });

  it.each(["high", "", "150", "-0.2", "0.8 or so"])("rejects %j", (text) => {
    expect(parseConfidenceValue(text)).toBeUndefined();
  });
});

describe("parseAgentResponse", () => {
  it("parses all three segments with no field absent", () => {
    const parsed = parseAgentResponse(
      "<reasoning>Because caching.</reasoning>\n<answer>Use Redis.</answer>\n<confidence>0.9</confidence>"
    );
    expect(parsed).toEqual({ reasoning: "Because caching.", answer: "Use Redis.", confidence: 0.9 });
  });

  it("accepts segments in any order", () => {
    const parsed = parseAgentResponse("<confidence>70%</confidence><answer>B</answer><reasoning>R</reasoning>");
    expect(parsed).toEqual({ reasoning: "R", answer: "B", confidence: 0.7 });
  });

  it("answer-only: reasoning and confidence absent, answer verbatim", () => {
    const parsed = parseAgentResponse("<answer>42</answer>");
    expect(parsed).toEqual({ answer: "42" });
    expect("confidence" in parsed).toBe(false);
    expect("reasoning" in parsed).toBe(false);
  });

  it("uses the whole text as the answer when there is no answer segment", () => {
    const raw = "  <reasoning>thinking</reasoning> The answer is 4.  ";
    expect(parseAgentResponse(raw)).toEqual({ answer: "<reasoning>thinking</reasoning> The answer is 4." });
  });

  it("keeps an explicit 0 distinct from a missing confidence", () => {
    expect(parseAgentResponse("<answer>a</answer><confidence>0</confidence>").confidence).toBe(0);
    expect(parseAgentResponse("<answer>a</answer><confidence>unsure</confidence>").confidence).toBeUndefined();
  });

  it("never throws on arbitrary text", () => {
    expect(parseAgentResponse("").answer).toBe("");
    expect(parseAgentResponse("<<<>>> </answer>").answer).toBe("<<<>>> </answer>");
  });
});

describe("parseSynthesis", () => {
  it("parses every segment", () => {
    const result = parseSynthesis([
      "<synthesis>Use Redis.</synthesis>",
      "<confidence>0.85</confidence>",
      "<analysis>Both agree.</analysis>",
      "<dissent>One prefers Memcached.</dissent>",
      "<needs_iteration>Yes</needs_iteration>",
      "<refinement_areas><area>Persistence</area><area>Cost</area></refinement_areas>",
    ].join("\n"));

    expect(result.synthesis).toBe("Use Redis.");
    expect(result.confidence).toBe(0.85);
    expect(result.confidenceReported).toBe(true);
    expect(result.analysis).toBe("Both agree.");
    expect(result.dissent).toBe("One prefers Memcached.");
    expect(result.needsIteration).toBe(true);
    expect(result.refinementAreas).toEqual(["Persistence", "Cost"]);
  });

  it("reads refinement areas one per line when there are no area tags", () => {
    const result = parseSynthesis("<refinement_areas>\n- first\n* second\n3. third\n\n</refinement_areas>");
    expect(result.refinementAreas).toEqual(["first", "second", "third"]);
  });

  it("falls back to the raw text and confidence 0", () => {
    const result = parseSynthesis("  Just an answer.  ");
    expect(result.synthesis).toBe("Just an answer.");
    expect(result.confidence).toBe(0);
    expect(result.confidenceReported).toBe(false);
    expect(result.needsIteration).toBe(false);
    expect(result.refinementAreas).toEqual([]);
    expect(result.analysis).toBe("");
    expect(result.raw).toBe("  Just an answer.  ");
  });

  it("treats anything but true/yes as no iteration", () => {
    expect(parseSynthesis("<needs_iteration>false</needs_iteration>").needsIteration).toBe(false);
    expect(parseSynthesis("<needs_iteration>maybe</needs_iteration>").needsIteration).toBe(false);
    expect(parseSynthesis("<needs_iteration>TRUE</needs_iteration>").needsIteration).toBe(true);
  });
});

const numbered: NumberedResponse[] = [
  { id: 1, agent: "x", instance: 1, answer: "X answer" },
  { id: 2, agent: "y", instance: 1, answer: "Y answer" },
];

describe("parsePickOne", () => {
  it("returns the chosen response's answer with confidence 1", () => {
    const result = parsePickOne("<analysis>Y is clearer.</analysis><response_id>2</response_id>", numbered);
    expect(result).not.toBeNull();
    expect(result?.synthesis).toBe("Y answer");
    expect(result?.confidence).toBe(1);
    expect(result?.chosenResponseId).toBe(2);
    expect(result?.analysis).toBe("Y is clearer.");
    expect(result?.needsIteration).toBe(false);
  });

  it("writes a default analysis when none is given", () => {
    expect(parsePickOne("<response_id>2</response_id>", numbered)?.analysis)
      .toBe("Arbiter selected response #2 from y#1.");
  });

  it("returns null for an unknown or non-numeric id", () => {
    expect(parsePickOne("<response_id>3</response_id>", numbered)).toBeNull();
    expect(parsePickOne("<response_id>two</response_id>", numbered)).toBeNull();
    expect(parsePickOne("no id", numbered)).toBeNull();
  });
});

describe("parseRank", () => {
  it("orders ranks by position and picks the top one", () => {
    const result = parseRank(
      '<ranking><rank position="2">1</rank><rank position="1">2</rank></ranking>',
      numbered
    );
    expect(result?.ranking).toEqual([2, 1]);
    expect(result?.synthesis).toBe("Y answer");
    expect(result?.confidence).toBe(1);
    expect(result?.analysis).toBe("Arbiter ranked all responses. Top choice is #2 from y#1. Full ranking: 2, 1");
  });

  it("uses document order when positions are missing", () => {
    expect(parseRank("<ranking><rank>1</rank><rank>2</rank></ranking>", numbered)?.ranking).toEqual([1, 2]);
  });

  it("returns null without a usable ranking", () => {
    expect(parseRank("nothing", numbered)).toBeNull();
    expect(parseRank("<ranking></ranking>", numbered)).toBeNull();
    expect(parseRank('<ranking><rank position="1">9</rank></ranking>', numbered)).toBeNull();
  });
});
