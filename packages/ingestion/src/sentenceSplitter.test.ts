import { describe, expect, it } from "vitest";
import { PunctuationSentenceSplitter, defaultSentenceSplitter } from "./sentenceSplitter.js";

const split = (text: string) => defaultSentenceSplitter.split(text);

describe("PunctuationSentenceSplitter", () => {
  it("splits on full stops, exclamation and question marks", () => {
    expect(split("Plasma is a fluid. It carries cells! Does it clot? Yes.")).toEqual([
      "Plasma is a fluid.",
      "It carries cells!",
      "Does it clot?",
      "Yes.",
    ]);
  });

  it("returns nothing for blank input", () => {
    expect(split("")).toEqual([]);
    expect(split("   \n ")).toEqual([]);
  });

  it("does not break after known abbreviations", () => {
    expect(split("Dr. Smith examined the patient. The result was normal.")).toEqual([
      "Dr. Smith examined the patient.",
      "The result was normal.",
    ]);
    expect(split("See the causes (e.g. Sepsis and trauma). Treat early.")).toEqual([
      "See the causes (e.g. Sepsis and trauma).",
      "Treat early.",
    ]);
  });

  it("does not break after single-letter initials", () => {
    expect(split("J. Smith wrote it. Then left.")).toEqual(["J. Smith wrote it.", "Then left."]);
  });

  it("keeps decimal numbers intact", () => {
    expect(split("The pH was 7.4 today. Normal.")).toEqual(["The pH was 7.4 today.", "Normal."]);
  });

  it("needs the next sentence to start like one", () => {
    expect(split("Normal range is 3 to 5 mmol. values vary.")).toEqual(["Normal range is 3 to 5 mmol. values vary."]);
  });

  it("keeps closing quotes with their sentence", () => {
    expect(split('He said "stop." Then left.')).toEqual(['He said "stop."', "Then left."]);
  });

  it("joins back to the input when words are single-spaced", () => {
    const text = "Blood has cells. Dr. Lee counts them. Is it 4.5 litres? It varies!";
    expect(split(text).join(" ")).toBe(text);
  });

  it("accepts a custom abbreviation list", () => {
    const splitter = new PunctuationSentenceSplitter(new Set(["approx"]));
    expect(splitter.split("Dr. Who. It is approx. Ten.")).toEqual(["Dr.", "Who.", "It is approx. Ten."]);
  });
});
