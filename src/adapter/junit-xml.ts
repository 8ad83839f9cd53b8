import { XMLParser, XMLValidator } from "fast-xml-parser";
import { STATUS, type ResultItem } from "../types/result-item.js";
import { fileMeta, type DecodeTarget } from "./target.js";

type XmlRecord = Record<string, unknown>;

const ATTRS = ":@";
const TEXT = "#text";

function asRecord(value: unknown): XmlRecord | null {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return null;
}

// With preserveOrder each element is `{ <tag>: children[], ":@": attributes }`.
function tagOf(node: XmlRecord): string | undefined {
  return Object.keys(node).find((k) => k !== ATTRS);
}

function childrenOf(node: XmlRecord): XmlRecord[] {
  const tag = tagOf(node);
  const value = tag === undefined ? undefined : node[tag];
  const children: unknown[] = Array.isArray(value) ? value : [];
  return children.map(asRecord).filter((c): c is XmlRecord => c !== null);
}

function childrenTagged(node: XmlRecord, ...tags: string[]): XmlRecord[] {
  return childrenOf(node).filter((c) => {
    const tag = tagOf(c);
    return tag !== undefined && tags.includes(tag);
  });
}

function attr(node: XmlRecord, name: string): string | undefined {
  const v = asRecord(node[ATTRS])?.[`@_${name}`];
  return typeof v === "string" ? v : undefined;
}

/** Message and body text of an element such as `<failure message="..">body</failure>`. */
function textOf(node: XmlRecord): string {
  const body = childrenOf(node)
    .map((c) => c[TEXT])
    .filter((t): t is string => typeof t === "string")
    .join("");
  return [attr(node, "message"), body].filter((p): p is string => !!p).join("\n");
}

function joinTexts(nodes: XmlRecord[]): string {
  return nodes.map(textOf).filter((t) => t !== "").join("\n");
}

function testCaseItem(tc: XmlRecord): ResultItem {
  const details: Record<string, unknown> = {};
  let status: string = STATUS.PASSED;

  const failures = childrenTagged(tc, "failure", "error");
  const skipped = childrenTagged(tc, "skipped");
  if (failures.length > 0) {
    status = STATUS.FAILED;
    details.failure = joinTexts(failures);
  } else if (skipped.length > 0) {
    status = STATUS.UNKNOWN;
    details.skipped = joinTexts(skipped);
  }

  for (const stream of ["system-out", "system-err"]) {
    const text = joinTexts(childrenTagged(tc, stream));
    if (text) details[stream] = text;
  }

  const item: ResultItem = { name: attr(tc, "name") ?? "testcase", status, items: [] };
  if (Object.keys(details).length > 0) item.details = details;
  return item;
}

/** Cases and nested suites in document order. */
function testSuiteItem(suite: XmlRecord): ResultItem {
  return {
    name: attr(suite, "name") ?? "testsuite",
    status: "",
    items: childrenTagged(suite, "testcase", "testsuite").map((c) =>
      tagOf(c) === "testcase" ? testCaseItem(c) : testSuiteItem(c),
    ),
  };
}

/**
 * Parse JUnit XML into a file item whose children are the report's suites.
 * Throws when the document is not well-formed XML.
 */
export function parseJunitXml(xmlContent: string, target: DecodeTarget): ResultItem {
  if (xmlContent.trim() === "") {
    throw new Error(`empty JUnit document: ${target.name}`);
  }
  const valid = XMLValidator.validate(xmlContent);
  if (valid !== true) {
    throw new Error(`malformed JUnit XML in ${target.name} (line ${valid.err.line}): ${valid.err.msg}`);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseTagValue: false,
    parseAttributeValue: false,
    ignoreDeclaration: true,
    preserveOrder: true,
  });
  const parsed: unknown = parser.parse(xmlContent);
  const top: unknown[] = Array.isArray(parsed) ? parsed : [];
  const roots = top.map(asRecord).filter((r): r is XmlRecord => r !== null);

  // Handle both <testsuites> wrapper and bare <testsuite> roots
  const suites = roots.flatMap((root) => {
    const tag = tagOf(root);
    if (tag === "testsuites") return childrenTagged(root, "testsuite");
    return tag === "testsuite" ? [root] : [];
  });

  return {
    name: target.name,
    status: "",
    meta: fileMeta(target),
    items: suites.map(testSuiteItem),
  };
}
