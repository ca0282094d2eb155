import { WordSource } from "../src/freq";

const s = new WordSource(Array.from({ length: 5000 }, (_, i) => ({ word: "word" + i, weight: (i % 17) + 1 })));

const t0 = performance.now();
for (let i = 0; i < 100_000; i++) s.randomWord();
const dt = performance.now() - t0;
console.log(`bench_sampler ms: ${dt.toFixed(2)}`);
