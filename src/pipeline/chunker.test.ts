/**
 * chunker.test.ts - Unit tests for text chunking
 *
 * Tests boundary selection, the overlap and coverage guarantees, and option
 * validation. The chunker is pure, so no mocks are needed.
 */

import { describe, it, expect } from "vitest";
import { chunkDocument, chunkId, chunkText } from "./chunker";

describe("chunkText", () => {
  it("returns no chunks for empty text", () => {
    expect(chunkText("", { chunkSize: 100, chunkOverlap: 10 })).toEqual([]);
  });

  it("returns a single chunk when the text fits", () => {
    expect(chunkText("short text", { chunkSize: 100, chunkOverlap: 10 })).toEqual([
      { text: "short text", start: 0, end: 10 },
    ]);
  });

  it("hard-cuts unbroken text and keeps the configured overlap", () => {
    const text = "a".repeat(2500);
    const spans = chunkText(text, { chunkSize: 1000, chunkOverlap: 200 });

    expect(spans.map((s) => [s.start, s.end])).toEqual([
      [0, 1000],
      [800, 1800],
      [1600, 2500],
    ]);
    expect(spans.map((s) => s.text.length)).toEqual([1000, 1000, 900]);
  });

  it("prefers a paragraph break over a hard cut", () => {
    const text = "A".repeat(60) + "\n\n" + "B".repeat(60);
    const spans = chunkText(text, { chunkSize: 100, chunkOverlap: 10 });

    expect(spans).toHaveLength(2);
    expect(spans[0].text).toBe("A".repeat(60) + "\n\n");
    expect(spans[1].start).toBe(52);
    expect(spans[1].end).toBe(122);
  });

  it("prefers a heading over paragraph and line breaks", () => {
    const text =
      "x".repeat(55) + "\n\n" + "y".repeat(10) + "\n## Next\n" + "z".repeat(60);
    const spans = chunkText(text, { chunkSize: 100, chunkOverlap: 0 });

    expect(spans).toHaveLength(2);
    expect(spans[0].text).toBe("x".repeat(55) + "\n\n" + "y".repeat(10) + "\n");
    expect(spans[1].text.startsWith("## Next\n")).toBe(true);
  });

  it("cuts after a horizontal rule", () => {
    const text = "p".repeat(60) + "\n---\n" + "q".repeat(60);
    const spans = chunkText(text, { chunkSize: 100, chunkOverlap: 0 });

    expect(spans[0].text).toBe("p".repeat(60) + "\n---\n");
    expect(spans[1].text).toBe("q".repeat(60));
  });

  it("falls back to a sentence break when there are no newlines", () => {
    const text = "a".repeat(70) + ". " + "b".repeat(60);
    const spans = chunkText(text, { chunkSize: 100, chunkOverlap: 0 });

    expect(spans.map((s) => [s.start, s.end])).toEqual([
      [0, 72],
      [72, 132],
    ]);
  });

  it("ignores boundaries in the first half of the window", () => {
    const text = "a".repeat(10) + "\n\n" + "b".repeat(150);
    const spans = chunkText(text, { chunkSize: 100, chunkOverlap: 0 });

    expect(spans[0].end).toBe(100);
  });

  it("covers the whole text with bounded, overlapping chunks", () => {
    const paragraphs: string[] = [];
    for (let i = 0; i < 40; i++) {
      paragraphs.push(`## Section ${i}\n\nLine one of ${i}. Line two of ${i}?\nmore text ${"w".repeat(i * 7)}`);
    }
    const text = paragraphs.join("\n\n");
    const options = { chunkSize: 300, chunkOverlap: 50 };
    const spans = chunkText(text, options);

    expect(spans[0].start).toBe(0);
    expect(spans[spans.length - 1].end).toBe(text.length);
    for (const [i, span] of spans.entries()) {
      expect(span.text.length).toBeLessThanOrEqual(300);
      expect(span.text).toBe(text.slice(span.start, span.end));
      if (i > 0) {
        expect(span.start).toBe(spans[i - 1].end - 50);
      }
    }
  });

  it("is deterministic", () => {
    const text = "One. Two! Three?\n".repeat(50);
    const options = { chunkSize: 120, chunkOverlap: 20 };
    expect(chunkText(text, options)).toEqual(chunkText(text, options));
  });

  it("does not split a surrogate pair at a hard cut", () => {
    const text = `${"a".repeat(9)}\u{1F600}${"b".repeat(10)}`;

    const spans = chunkText(text, { chunkSize: 10, chunkOverlap: 0 });

    expect(spans.map((s) => s.text)).toEqual([
      "a".repeat(9),
      `\u{1F600}${"b".repeat(8)}`,
      "bb",
    ]);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => chunkText("abc", { chunkSize: 100, chunkOverlap: 100 })).toThrow(
      RangeError
    );
  });

  it("rejects a non-positive or fractional chunk size", () => {
    expect(() => chunkText("abc", { chunkSize: 0, chunkOverlap: 0 })).toThrow(RangeError);
    expect(() => chunkText("abc", { chunkSize: 10.5, chunkOverlap: 0 })).toThrow(
      RangeError
    );
  });

  it("rejects a negative overlap", () => {
    expect(() => chunkText("abc", { chunkSize: 10, chunkOverlap: -1 })).toThrow(RangeError);
  });
});

describe("chunkDocument", () => {
  it("numbers chunks from zero and records the source", () => {
    const chunks = chunkDocument(
      { path: "/docs/guide.md", text: "a".repeat(250) },
      { chunkSize: 100, chunkOverlap: 0 }
    );

    expect(chunks.map((c) => c.index)).toEqual([0, 1, 2]);
    expect(chunks.every((c) => c.source === "/docs/guide.md")).toBe(true);
  });
});

describe("chunkId", () => {
  it("joins the normalized path and index", () => {
    expect(chunkId("/docs/a/../guide.md", 3)).toBe("/docs/guide.md:3");
  });
});
