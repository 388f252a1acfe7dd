import { describe, expect, it } from "vitest";
import { labelFacts, REFUSAL_TEXT } from "../prompts";
import { claimSentences, verifyGrounding } from "../verify_grounding";
import { makeFact } from "@/src/lib/kg/__tests__/fixtures";

const labelled = labelFacts(
  [
    makeFact({ category: "driving_force", predicate: "motivated_by", value: "recognition", source_page: 3 }),
    makeFact({ category: "motivator", predicate: "values", value: "stability", source_page: 4 }),
  ],
  12
);

describe("verifyGrounding", () => {
  it("accepts cited claims and reports facts in order of first citation", () => {
    const check = verifyGrounding("Dana values stability [F2]. She is motivated by recognition [F1]. Stability comes first [F2].", labelled);
    expect(check.ok).toBe(true);
    expect(check.cited.map((item) => item.label)).toEqual(["F2", "F1"]);
  });

  it("rejects citations outside the supplied facts", () => {
    const check = verifyGrounding("Dana is motivated by recognition [F3].", labelled);
    expect(check.ok).toBe(false);
    expect(check.errors).toEqual(["Unknown citation [F3]."]);
  });

  it("rejects sentences without a citation", () => {
    const check = verifyGrounding(
      "Dana is motivated by recognition [F1]. She will definitely buy the premium package next week.",
      labelled
    );
    expect(check.ok).toBe(false);
    expect(check.errors).toEqual(['Uncited claim: "She will definitely buy the premium package next week."']);
  });

  it("allows greetings, sign-offs, headings and quoted caller text", () => {
    const text = [
      "## A heading with far more than six words in it",
      "Thanks again for your time.",
      "> The client agreed to meet again in two weeks",
      "- Motivated by recognition [F1].",
      "Best regards,",
    ].join("\n");
    expect(verifyGrounding(text, labelled)).toEqual({ ok: true, refused: false, cited: [labelled[0]], errors: [] });
  });

  it("rejects a short uncited statement about the client", () => {
    const check = verifyGrounding("Dana is motivated by recognition [F1]. She hates phone calls.", labelled);
    expect(check.errors).toEqual(['Uncited claim: "She hates phone calls."']);
  });

  it("rejects a sentence that cites a fact it does not restate", () => {
    const check = verifyGrounding("Dana wants a ten percent discount on the annual contract [F1].", labelled);
    expect(check.ok).toBe(false);
    expect(check.cited).toEqual([labelled[0]]);
    expect(check.errors).toEqual([
      'Claim does not match [F1]: "Dana wants a ten percent discount on the annual contract [F1]."',
    ]);
  });

  it("requires every tag on a sentence to be restated", () => {
    const check = verifyGrounding("She is motivated by recognition [F1][F2].", labelled);
    expect(check.errors).toEqual(['Claim does not match [F2]: "She is motivated by recognition [F1][F2]."']);
    expect(verifyGrounding("She is motivated by recognition and stability [F1][F2].", labelled).ok).toBe(true);
  });

  it("matches restated words across simple inflections", () => {
    const meetings = labelFacts([makeFact({ predicate: "prefers", value: "short meetings" })], 12);
    expect(verifyGrounding("Keep each meeting brief [F1].", meetings).ok).toBe(true);
  });

  it("treats a greeting line as courtesy even with a long name or a title", () => {
    const text = ["Hi Maria del Carmen Lopez Garcia,", "Hi Dr. Lee,", "Values stability [F2]."].join("\n");
    expect(verifyGrounding(text, labelled).errors).toEqual([]);
  });

  it("rejects output that cites nothing", () => {
    expect(verifyGrounding("Thanks.", labelled).errors).toEqual(["Output cites no facts."]);
    expect(verifyGrounding("   ", labelled).errors).toEqual(["Output is empty."]);
  });

  it("accepts the refusal sentence as a grounded answer", () => {
    expect(verifyGrounding(`  ${REFUSAL_TEXT}\n`, labelled)).toEqual({ ok: true, refused: true, cited: [], errors: [] });
  });
});

describe("claimSentences", () => {
  it("keeps a tag that follows the full stop with its sentence", () => {
    expect(claimSentences("Dana is motivated by recognition. [F1] Next she values stability [F2].")).toEqual([
      "Dana is motivated by recognition. [F1]",
      "Next she values stability [F2].",
    ]);
  });

  it("does not split before a lower-case word", () => {
    expect(claimSentences("She prefers e.g. written notes [F1].")).toEqual(["She prefers e.g. written notes [F1]."]);
  });
});
