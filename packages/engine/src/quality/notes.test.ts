import { describe, it, expect } from "vitest";
import { appendUnique, joinTagList, mergeNotes, parseTagList } from "./notes.js";

describe("appendUnique", () => {
  it("keeps first-seen order and drops duplicates", () => {
    expect(appendUnique(["a", "b"], "b", "c", "a", "d")).toEqual(["a", "b", "c", "d"]);
  });

  it("does not modify the input list", () => {
    const list = ["a"];
    appendUnique(list, "b");
    expect(list).toEqual(["a"]);
  });
});

describe("mergeNotes", () => {
  it("concatenates each list in order", () => {
    const merged = mergeNotes(
      { missing: ["width"], bonus: ["wide width"] },
      { missing: ["lit", "width"], malus: ["no street lighting"] },
      {},
    );
    expect(merged).toEqual({
      missing: ["width", "lit"],
      bonus: ["wide width"],
      malus: ["no street lighting"],
    });
  });

  it("returns empty lists for no input", () => {
    expect(mergeNotes()).toEqual({ missing: [], bonus: [], malus: [] });
  });
});

describe("tag lists", () => {
  it("serializes with semicolons", () => {
    expect(joinTagList(["width", "surface"])).toBe("width;surface");
    expect(joinTagList([])).toBe("");
  });

  it("parses back to the same ordered list", () => {
    const list = ["excellent surface", "slow traffic", "wide width"];
    expect(parseTagList(joinTagList(list))).toEqual(list);
    expect(parseTagList("")).toEqual([]);
    expect(parseTagList(null)).toEqual([]);
  });
});
