import { scanJsonObjects } from "../../src/extract/scanJsonObjects";

describe("scanJsonObjects", () => {
  test("ignores braces inside strings", () => {
    const input = '{"a": "text with { and } inside", "b": {"c": 1}}';
    expect(scanJsonObjects(input)).toEqual([input]);
  });

  test("finds every complete top-level object in surrounding prose", () => {
    const input = 'Here you go: {"a": 1} and also {"b": {"c": [2]}} done.';
    expect(scanJsonObjects(input)).toEqual(['{"a": 1}', '{"b": {"c": [2]}}']);
  });

  test("honors escaped quotes inside strings", () => {
    const input = '{"q": "she said \\"}\\" loudly"}';
    expect(scanJsonObjects(input)).toEqual([input]);
  });

  test("returns nothing for a truncated object", () => {
    expect(scanJsonObjects('{"key": "value", "incomplete":')).toEqual([]);
  });

  test("an unterminated object swallows the objects after it", () => {
    expect(scanJsonObjects('{"a": {"b": 1} {"c": 2}')).toEqual([]);
  });

  test("a stray closing brace before an object is ignored", () => {
    expect(scanJsonObjects('noise } {"c": 2}')).toEqual(['{"c": 2}']);
  });
});
