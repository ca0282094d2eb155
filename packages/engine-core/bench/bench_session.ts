import { Engine } from "../src/engine";
import { WordSource } from "../src/freq";

const e = Engine.create(new WordSource([{ word: "hello", weight: 3 }, { word: "help", weight: 2 }, { word: "helium", weight: 1 }]));

const t0 = performance.now();
let lines = 0;
for (let i = 0; i < 100_000; i++) {
  const target = e.snapshot().activeTarget ?? " ";
  if (i % 7 === 0) e.applyChar("x");
  if (e.applyChar(target).status === "completed") lines++;
}
const dt = performance.now() - t0;
console.log(`bench_session ms: ${dt.toFixed(2)} (${lines} lines)`);
