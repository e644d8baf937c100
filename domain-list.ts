#!/usr/bin/env node

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";

const DOMAIN_LIST_FILE = "domain.txt";
const DOMAIN_SET_FILE = "domainset.txt";
const DOMAIN_SET_PREFIX = "+.";
const EXCLUDED_CHARS_REGEX = /[@*]/;
const RULE_DOMAIN_REGEX = /(?<=\|\|).+(?=\^)/;
const LINE_BREAK_REGEX = /\r\n|\r|\n/;
const USAGE = "Usage: domain-list <rules-file> [output-dir]";

type ExportSummary = {
  domainListPath: string;
  domainSetPath: string;
  domains: number;
};

/**
 * Writes `domain.txt` (bare domains) and `domainset.txt` (`+.`-prefixed, for
 * suffix-matching rule sets) from an optimized rule file.
 */
export async function exportDomainLists(
  rulesPath: string,
  outputDir: string = path.dirname(rulesPath),
): Promise<ExportSummary> {
  const source = await readFile(rulesPath, "utf8");
  const domains = extractListDomains(source.split(LINE_BREAK_REGEX));

  await mkdir(outputDir, { recursive: true });

  const domainListPath = path.join(outputDir, DOMAIN_LIST_FILE);
  const domainSetPath = path.join(outputDir, DOMAIN_SET_FILE);
  await writeFile(domainListPath, toFileContent(domains), "utf8");
  await writeFile(domainSetPath, toFileContent(toDomainSet(domains)), "utf8");

  return {
    domainListPath,
    domainSetPath,
    domains: domains.length,
  };
}

// Exception (@@) and wildcard rules have no plain-domain form.
export function extractListDomains(lines: string[]) {
  const domains: string[] = [];

  for (const line of lines) {
    if (EXCLUDED_CHARS_REGEX.test(line)) {
      continue;
    }

    const match = RULE_DOMAIN_REGEX.exec(line);
    if (match) {
      domains.push(match[0]);
    }
  }

  return domains;
}

export function toDomainSet(domains: string[]) {
  return domains.map((domain) => `${DOMAIN_SET_PREFIX}${domain}`);
}

function toFileContent(lines: string[]) {
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

export async function main(args: string[]) {
  if (args.length < 1 || args.length > 2) {
    console.log(USAGE);
    process.exit(1);
  }

  const [rulesPath, outputDir] = args;
  const summary = await exportDomainLists(rulesPath, outputDir);

  console.log(
    `Wrote ${summary.domains} domains to ${summary.domainListPath} and ${summary.domainSetPath}`,
  );
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
