#!/usr/bin/env node

import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { countrySuffixes } from "./country-suffixes.ts";

const HEADER_TITLE = "Optimized Adblock Rules";
const HEADER_DESCRIPTION = "This is an optimized adblock filter list.";
const COMMENT_MARKER = "!";
const SECTION_MARKER = "[";
const RULE_PREFIX = "||";
const RULE_SUFFIX = "^";
const BLOCK_RULE_REGEX = /^\|\|[^\^]+?\^$/;
const COUNTRY_SUFFIX_REGEX = new RegExp(
  String.raw`\.(?:${[...countrySuffixes].join("|")})\^$`,
);
const LINE_BREAK_REGEX = /\r\n|\r|\n/;
const USAGE = "Usage: sort-rules <file>";

type Clock = () => Date;

type OptimizeOptions = {
  clock?: Clock;
};

type OptimizeSummary = {
  filePath: string;
  inputLines: number;
  filteredRules: number;
  uniqueRules: number;
};

export async function optimizeRuleFile(
  filePath: string,
  options: OptimizeOptions = {},
): Promise<OptimizeSummary> {
  const lines = await readRuleLines(filePath);
  const filtered = filterRules(lines);
  const unique = removeDuplicates(filtered);
  const sorted = sortRules(unique);
  const header = buildHeader(filePath, sorted.length, options.clock);

  await writeRuleFile(filePath, [...header, ...sorted]);

  return {
    filePath,
    inputLines: lines.length,
    filteredRules: filtered.length,
    uniqueRules: sorted.length,
  };
}

export async function readRuleLines(filePath: string) {
  const source = await readFile(filePath, "utf8");
  return source
    .split(LINE_BREAK_REGEX)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function writeRuleFile(filePath: string, lines: string[]) {
  await writeFile(filePath, `${lines.join("\n")}\n`, "utf8");
}

export function filterRules(lines: string[]) {
  return lines.filter((line) => {
    if (line.startsWith(COMMENT_MARKER) || line.startsWith(SECTION_MARKER)) {
      return false;
    }
    if (isCountrySuffixRule(line)) {
      return false;
    }
    return BLOCK_RULE_REGEX.test(line);
  });
}

export function isCountrySuffixRule(line: string) {
  return COUNTRY_SUFFIX_REGEX.test(line);
}

export function removeDuplicates(lines: string[]) {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const line of lines) {
    if (seen.has(line)) {
      continue;
    }
    seen.add(line);
    unique.push(line);
  }

  return unique;
}

export function extractDomain(rule: string) {
  const segments = rule.split(RULE_PREFIX);
  return segments[segments.length - 1].split(RULE_SUFFIX)[0];
}

// Ordered by the label before the TLD, then by the whole domain.
export function sortRules(rules: string[]) {
  const keyed = rules.map((rule) => {
    const domain = extractDomain(rule);
    const labels = domain.split(".");
    const secondLevel = labels.length > 1 ? labels[labels.length - 2] : labels[0];
    return { rule, secondLevel, domain };
  });

  keyed.sort(
    (a, b) => compareStrings(a.secondLevel, b.secondLevel) || compareStrings(a.domain, b.domain),
  );

  return keyed.map((entry) => entry.rule);
}

export function buildHeader(filePath: string, ruleCount: number, clock: Clock = () => new Date()) {
  const lastModified = clock();
  const version = clock();

  return [
    `${COMMENT_MARKER} Title: ${HEADER_TITLE}`,
    `${COMMENT_MARKER} Description: ${HEADER_DESCRIPTION}`,
    `${COMMENT_MARKER} Source file: ${filePath}`,
    `${COMMENT_MARKER} Version: ${formatVersion(version)}`,
    `${COMMENT_MARKER} Last Modified: ${formatTimestamp(lastModified)}`,
    `${COMMENT_MARKER} Total Rules: ${ruleCount}`,
    COMMENT_MARKER,
  ];
}

function formatVersion(date: Date) {
  const parts = dateParts(date);
  return `${parts.year}${parts.month}${parts.day}${parts.hours}${parts.minutes}${parts.seconds}`;
}

function formatTimestamp(date: Date) {
  const parts = dateParts(date);
  return `${parts.year}-${parts.month}-${parts.day} ${parts.hours}:${parts.minutes}:${parts.seconds}`;
}

function dateParts(date: Date) {
  return {
    year: String(date.getFullYear()).padStart(4, "0"),
    month: pad2(date.getMonth() + 1),
    day: pad2(date.getDate()),
    hours: pad2(date.getHours()),
    minutes: pad2(date.getMinutes()),
    seconds: pad2(date.getSeconds()),
  };
}

function pad2(value: number) {
  return String(value).padStart(2, "0");
}

function compareStrings(a: string, b: string) {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}

export async function main(args: string[]) {
  if (args.length !== 1) {
    console.log(USAGE);
    process.exit(1);
  }

  const [filePath] = args;
  const summary = await optimizeRuleFile(filePath);

  console.log(`Optimized ${summary.filePath}: ${summary.uniqueRules} rules.`);
}

if (isDirectRun(import.meta.url)) {
  await main(process.argv.slice(2));
}

function isDirectRun(moduleUrl: string) {
  const entryPath = process.argv[1];
  if (!entryPath) {
    return false;
  }
  return moduleUrl === pathToFileURL(path.resolve(entryPath)).href;
}
