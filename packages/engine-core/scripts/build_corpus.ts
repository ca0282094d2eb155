import { promises as fs } from "node:fs";
import path from "node:path";
import { countWords, formatFreqTable, isWord } from "../src/freq";

type Config = {
  inputDir: string;
  outFile: string;
  minWordFreq: number;
  maxWords: number;
  maxWordLength: number;
};

const DEFAULT_CONFIG: Config = {
  inputDir: path.resolve("corpus/raw"),
  outFile: path.resolve("corpus/freq.txt"),
  minWordFreq: 2,
  maxWords: 20_000,
  maxWordLength: 12
};

function parseArgs(): Config {
  const cfg: Config = { ...DEFAULT_CONFIG };
  for (const arg of process.argv.slice(2)) {
    const [key, value] = arg.split("=");
    if (!key || value === undefined) continue;
    switch (key) {
      case "--input":
        cfg.inputDir = path.resolve(value);
        break;
      case "--out":
        cfg.outFile = path.resolve(value);
        break;
      case "--min-word-freq":
        cfg.minWordFreq = Number(value);
        break;
      case "--max-words":
        cfg.maxWords = Number(value);
        break;
      case "--max-word-length":
        cfg.maxWordLength = Number(value);
        break;
      default:
        break;
    }
  }
  return cfg;
}

async function walkFiles(root: string): Promise<string[]> {
  const out: string[] = [];
  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isFile() && /\.(txt|md)$/i.test(entry.name)) {
        out.push(full);
      }
    }
  }
  await walk(root);
  return out;
}

async function main(): Promise<void> {
  const cfg = parseArgs();
  const files = await walkFiles(cfg.inputDir);
  if (files.length === 0) {
    throw new Error(`No source files in ${cfg.inputDir}`);
  }

  const lines: string[] = [];
  for (const file of files) {
    const raw = await fs.readFile(file, "utf8");
    lines.push(...raw.split(/\r?\n/));
  }

  const rows = [...countWords(lines).entries()]
    .filter(([word, count]) => count >= cfg.minWordFreq && isWord(word) && word.length <= cfg.maxWordLength)
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, cfg.maxWords);

  await fs.mkdir(path.dirname(cfg.outFile), { recursive: true });
  await fs.writeFile(cfg.outFile, formatFreqTable(rows.map(([word, weight]) => ({ word, weight }))), "utf8");

  console.log(`[corpus] input files: ${files.length}`);
  console.log(`[corpus] lines: ${lines.length}`);
  console.log(`[corpus] table: ${cfg.outFile} (${rows.length} words)`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
