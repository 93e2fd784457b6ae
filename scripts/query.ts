import "dotenv/config";
import { createLogger, errorMessage } from "@medrag/core";
import { MedicalAssistant, RetrievalContext, formatDetailedAnswer } from "@medrag/retrieval";
import { getArg, getArgNumber, hasFlag } from "./args.js";

const log = createLogger("query");

const q = getArg("q");

if (!q) {
  console.error('Usage: npm run query -- --q "<question>" [--topK 3] [--json]');
  process.exit(1);
}

const ctx = new RetrievalContext();
const assistant = new MedicalAssistant(ctx);
const topK = getArgNumber("topK", ctx.config.topKDefault);

try {
  const answer = await assistant.query(q, topK);
  console.log(hasFlag("json") ? JSON.stringify(answer, null, 2) : formatDetailedAnswer(answer));
} catch (err) {
  log.error("failed:", errorMessage(err));
  process.exitCode = 1;
} finally {
  ctx.close();
}
