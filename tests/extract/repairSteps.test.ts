import {
  closeUnbalancedBrackets,
  closeUnbalancedQuote,
  quoteSingleQuotedKeys,
  REPAIR_STEPS,
  removeInvalidEscapes,
  removeTrailingCommas,
  repairJsonText,
  splitStringLiterals,
  stripCodeFence,
  stripComments,
} from "../../src/extract/repairSteps";

describe("repair steps", () => {
  test("run in a fixed order", () => {
    expect(REPAIR_STEPS.map((s) => s.name)).toEqual([
      "strip_code_fence",
      "close_unbalanced_quote",
      "close_unbalanced_brackets",
      "remove_trailing_commas",
      "quote_single_quoted_keys",
      "strip_comments",
      "remove_invalid_escapes",
    ]);
  });

  test("stripCodeFence removes fences with or without a language tag", () => {
    expect(stripCodeFence('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(stripCodeFence('```\n{"a": 1}\n```  ')).toBe('{"a": 1}');
    expect(stripCodeFence('`{"a": 1}`')).toBe('{"a": 1}');
    expect(stripCodeFence('{"a": 1}')).toBe('{"a": 1}');
  });

  test("closeUnbalancedQuote closes the last open string before the next delimiter", () => {
    expect(closeUnbalancedQuote('{"a": "hello}')).toBe('{"a": "hello"}');
    expect(closeUnbalancedQuote('{"a": "x", "b": "cut')).toBe('{"a": "x", "b": "cut"');
    expect(closeUnbalancedQuote('{"a": "say \\"hi\\""}')).toBe('{"a": "say \\"hi\\""}');
  });

  test("closeUnbalancedBrackets appends braces then brackets and ignores string contents", () => {
    expect(closeUnbalancedBrackets('{"a": {"b": 1}')).toBe('{"a": {"b": 1}}');
    expect(closeUnbalancedBrackets('{"a": "{["')).toBe('{"a": "{["}');
    expect(closeUnbalancedBrackets('{"a": [1')).toBe('{"a": [1}]');
  });

  test("removeTrailingCommas only touches commas before a closer", () => {
    expect(removeTrailingCommas('{"a": [1, 2,], "b": 3,\n}')).toBe('{"a": [1, 2], "b": 3\n}');
    expect(removeTrailingCommas('{"a": "x,}"}')).toBe('{"a": "x,}"}');
  });

  test("quoteSingleQuotedKeys rewrites keys outside strings", () => {
    expect(quoteSingleQuotedKeys("{'a': 1, 'b c': 2}")).toBe('{"a": 1, "b c": 2}');
    expect(quoteSingleQuotedKeys('{"a": "it\'s \'x\': y"}')).toBe('{"a": "it\'s \'x\': y"}');
  });

  test("stripComments removes line and block comments but not URLs in strings", () => {
    const input = '{\n  // note\n  "url": "https://example.com", /* inline */ "n": 1\n}';
    expect(stripComments(input)).toBe('{\n  \n  "url": "https://example.com",  "n": 1\n}');
  });

  test("removeInvalidEscapes drops spurious escapes and keeps valid ones", () => {
    expect(removeInvalidEscapes('"Use \\[A\\] or \\(B\\)"')).toBe('"Use [A] or (B)"');
    const valid = '"line\\nnext\\ttab \\"q\\" back\\\\slash \\u00e9 \\/"';
    expect(removeInvalidEscapes(valid)).toBe(valid);
    expect(removeInvalidEscapes('"a\\\\[b"')).toBe('"a\\\\[b"');
  });

  test("removeInvalidEscapes treats an upper-case \\U like any other invalid escape", () => {
    expect(removeInvalidEscapes('"\\U00e9"')).toBe('"U00e9"');
  });

  test("splitStringLiterals separates strings from structure", () => {
    expect(splitStringLiterals('{"a": "b\\"c"}')).toEqual([
      { inString: false, text: "{" },
      { inString: true, text: '"a"' },
      { inString: false, text: ": " },
      { inString: true, text: '"b\\"c"' },
      { inString: false, text: "}" },
    ]);
  });

  test("the escape example parses after the full repair", () => {
    const repaired = repairJsonText('{"text": "Use \\[A\\] or \\[B\\]"}');
    expect(JSON.parse(repaired)).toEqual({ text: "Use [A] or [B]" });
  });

  test("repair leaves valid JSON unchanged", () => {
    const valid = '{"a": [1, 2], "b": {"c": "x, y"}, "d": "tab\\there"}';
    expect(repairJsonText(valid)).toBe(valid);
  });
});
