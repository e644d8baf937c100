import { readFile } from "node:fs/promises";

const COUNTRY_SUFFIXES_FILE_URL = new URL("./data/country-suffixes.txt", import.meta.url);
const COMMENT_MARKER = "#";
const SUFFIX_REGEX = /^[a-z]{2}$/;

const suffixSource = await readFile(COUNTRY_SUFFIXES_FILE_URL, "utf8");

const countrySuffixes: ReadonlySet<string> = parseCountrySuffixes(suffixSource);

export default countrySuffixes;
export { countrySuffixes, parseCountrySuffixes };

function parseCountrySuffixes(source: string) {
  const suffixes = new Set<string>();
  const lines = source.split(/\r?\n/);

  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i].trim();
    if (!line || line.startsWith(COMMENT_MARKER)) {
      continue;
    }

    if (!SUFFIX_REGEX.test(line)) {
      throw new Error(`Invalid country suffix at line ${i + 1}: ${line}`);
    }

    suffixes.add(line);
  }

  return suffixes;
}
