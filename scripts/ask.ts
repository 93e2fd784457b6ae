import "dotenv/config";
import { readFileSync } from "node:fs";
import { createLogger, errorMessage } from "@medrag/core";
import { MedicalAssistant, RetrievalContext } from "@medrag/retrieval";
import { getArg } from "./args.js";

const log = createLogger("ask");

const q = getArg("q");
const file = getArg("file");

if (!q && !file) {
  console.error(`Usage:
npm run ask -- --q "What is plasma?"
npm run ask -- --file questions.txt   (one question per line)`);
  process.exit(1);
}

const ctx = new RetrievalContext();
const assistant = new MedicalAssistant(ctx);

try {
  if (q) {
    console.log(await assistant.ask(q));
  } else if (file) {
    const questions = readFileSync(file, "utf8")
      .split("\n")
      .map((l) => l.trim())
      .filter((l) => l.length > 0);

    const answers = await assistant.batchAsk(questions);
    answers.forEach((answer, i) => {
      console.log("—".repeat(80));
      console.log(`Q${i + 1}: ${questions[i]}\n`);
      console.log(answer);
    });
    console.log("—".repeat(80));
  }
} catch (err) {
  log.error("failed:", errorMessage(err));
  process.exitCode = 1;
} finally {
  ctx.close();
}
