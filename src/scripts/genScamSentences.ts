import fs from "fs";
import path from "path";
import { SENTENCES_FILE } from "../core/corpus";
import { generateSentences, loadTemplatePools } from "../core/sentenceGenerator";

const dataDir = process.env.DATA_DIR ? path.resolve(process.env.DATA_DIR) : path.resolve(__dirname, "..", "..", "data");
const count = Number(process.argv[2] || 1000);

const pools = loadTemplatePools(path.join(dataDir, "scam_templates.json"));
const sentences = generateSentences(Number.isFinite(count) && count > 0 ? count : 1000, pools);
fs.writeFileSync(path.join(dataDir, SENTENCES_FILE), `${sentences.join("\n")}\n`);

console.log(`Generated ${sentences.length} scam sentences into ${SENTENCES_FILE}`);
