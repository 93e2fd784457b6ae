import "dotenv/config";
import { readFileSync } from "node:fs";
import { z } from "zod";
import { createLogger, errorMessage } from "@medrag/core";
import type { Answer } from "@medrag/core";
import { MedicalAssistant, RetrievalContext, formatSource } from "@medrag/retrieval";
import { getArg, getArgNumber, hasFlag } from "./args.js";

const log = createLogger("eval");

const evalCaseSchema = z.object({
  id: z.string().optional(),
  q: z.string().min(1),
  // source paths (prefixes) expected among the returned passages
  mustContain: z.array(z.string()).default([]),
  expectReject: z.boolean().default(false),
});

type EvalCase = z.infer<typeof evalCaseSchema>;

function loadJsonl(path: string): EvalCase[] {
  const raw = readFileSync(path, "utf8");
  return raw
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .map((l) => evalCaseSchema.parse(JSON.parse(l)));
}

function answerSources(answer: Answer): string[] {
  if (answer.kind !== "answer") return [];
  return [answer.primary, ...answer.supporting].map(formatSource);
}

function hitAtK(sources: string[], mustContain: string[], k: number): boolean {
  const top = sources.slice(0, k);
  return mustContain.some((needle) => top.some((s) => s.startsWith(needle)));
}

const evalPath = getArg("evalPath") ?? "eval/cases.jsonl";
const topK = getArgNumber("topK", 5);
const debugMisses = hasFlag("debugMisses");
const ks = [1, 3, 5].filter((k) => k <= topK);

const ctx = new RetrievalContext();
const assistant = new MedicalAssistant(ctx);

try {
  const cases = loadJsonl(evalPath);
  if (cases.length === 0) {
    console.error("[eval] no cases found in", evalPath);
    process.exit(1);
  }

  log.info("start", { evalPath, topK, threshold: ctx.config.relevanceThreshold, ks });

  const answers = await assistant.batchQuery(
    cases.map((c) => c.q),
    topK
  );

  const hits: Record<number, number> = Object.fromEntries(ks.map((k) => [k, 0]));
  let retrievalCases = 0;
  let gateCorrect = 0;
  let errors = 0;

  cases.forEach((c, i) => {
    const answer = answers[i];
    if (!answer || answer.kind === "error") {
      errors++;
      console.log(`[case ${c.id ?? i + 1}] error ${answer?.kind === "error" ? answer.error.code : "missing"}`);
      return;
    }

    const rejected = answer.kind === "refuse";
    if (rejected === c.expectReject) gateCorrect++;

    const sources = answerSources(answer);
    if (c.mustContain.length > 0) {
      retrievalCases++;
      for (const k of ks) {
        if (hitAtK(sources, c.mustContain, k)) hits[k] = (hits[k] ?? 0) + 1;
      }
    }

    const gateOk = rejected === c.expectReject ? "✅" : "❌";
    console.log(
      `[case ${c.id ?? i + 1}] gate=${gateOk} best=${answer.bestScore.toFixed(4)} top=${sources[0] ?? "(rejected)"} q="${c.q}"`
    );

    if (debugMisses && c.mustContain.length > 0 && !hitAtK(sources, c.mustContain, topK)) {
      console.log("  mustContain:", c.mustContain);
      console.log("  sources:", sources);
    }
  });

  console.log("\n=== RESULTS ===");
  const scored = cases.length - errors;
  console.log(`gate accuracy: ${gateCorrect}/${scored}`);
  for (const k of ks) {
    const hitCount = hits[k] ?? 0;
    const rate = retrievalCases === 0 ? 0 : hitCount / retrievalCases;
    console.log(`hit@${k}: ${hitCount}/${retrievalCases} = ${(rate * 100).toFixed(1)}%`);
  }
  if (errors > 0) console.log(`errors: ${errors}`);
} catch (err) {
  log.error("failed:", errorMessage(err));
  process.exitCode = 1;
} finally {
  ctx.close();
}
