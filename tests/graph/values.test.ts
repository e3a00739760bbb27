import { describe, it, expect } from "vitest";
import neo4j, { Node, Path, PathSegment, Point, Relationship } from "neo4j-driver";
import { toPlainValue } from "../../src/graph/values.js";

const tom = new Node(neo4j.int(1), ["Person"], { name: "Tom Hanks", born: neo4j.int(1956) }, "4:db:1");
const movie = new Node(neo4j.int(2), ["Movie"], { title: "Forrest Gump", released: neo4j.int(1994) }, "4:db:2");
const actedIn = new Relationship(
  neo4j.int(7),
  neo4j.int(1),
  neo4j.int(2),
  "ACTED_IN",
  { roles: ["Forrest"] },
  "5:db:7",
  "4:db:1",
  "4:db:2",
);

describe("toPlainValue", () => {
  it("passes scalars through", () => {
    expect(toPlainValue("text")).toBe("text");
    expect(toPlainValue(true)).toBe(true);
    expect(toPlainValue(3.25)).toBe(3.25);
    expect(toPlainValue(null)).toBeNull();
    expect(toPlainValue(undefined)).toBeNull();
  });

  it("renders non-finite floats as strings", () => {
    expect(toPlainValue(Number.NaN)).toBe("NaN");
    expect(toPlainValue(Number.POSITIVE_INFINITY)).toBe("Infinity");
  });

  it("converts safe integers to numbers and large ones to strings", () => {
    expect(toPlainValue(neo4j.int(42))).toBe(42);
    expect(toPlainValue(neo4j.int("9007199254740993"))).toBe("9007199254740993");
  });

  it("converts nodes to identity, labels and properties", () => {
    expect(toPlainValue(tom)).toEqual({
      identity: 1,
      elementId: "4:db:1",
      labels: ["Person"],
      properties: { name: "Tom Hanks", born: 1956 },
    });
  });

  it("converts relationships with their endpoints and type", () => {
    expect(toPlainValue(actedIn)).toEqual({
      identity: 7,
      elementId: "5:db:7",
      start: 1,
      end: 2,
      type: "ACTED_IN",
      properties: { roles: ["Forrest"] },
    });
  });

  it("converts paths segment by segment", () => {
    const path = new Path(tom, movie, [new PathSegment(tom, actedIn, movie)]);
    const plain = toPlainValue(path);

    expect(plain).toEqual({
      start: toPlainValue(tom),
      end: toPlainValue(movie),
      segments: [
        { start: toPlainValue(tom), relationship: toPlainValue(actedIn), end: toPlainValue(movie) },
      ],
    });
  });

  it("converts points, omitting z for 2D points", () => {
    expect(toPlainValue(new Point(neo4j.int(4326), 12.5, 41.9))).toEqual({
      srid: 4326,
      x: 12.5,
      y: 41.9,
    });
    expect(toPlainValue(new Point(neo4j.int(9157), 1, 2, 3))).toEqual({
      srid: 9157,
      x: 1,
      y: 2,
      z: 3,
    });
  });

  it("renders temporal values as ISO strings", () => {
    expect(toPlainValue(new neo4j.types.Date(2024, 1, 15))).toBe("2024-01-15");
  });

  it("converts lists and maps recursively", () => {
    expect(
      toPlainValue({ people: [tom], count: neo4j.int(1), meta: { tags: ["a", "b"] } }),
    ).toEqual({
      people: [toPlainValue(tom)],
      count: 1,
      meta: { tags: ["a", "b"] },
    });
  });

  it("produces JSON that survives a round trip unchanged", () => {
    const plain = toPlainValue({ p: tom, r: actedIn, m: movie });
    expect(JSON.parse(JSON.stringify(plain))).toEqual(plain);
  });
});
