import { readFile } from "node:fs/promises";
import path from "node:path";
import { createEmbeddingCapability } from "../src/ai/embeddings.capability";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";
import { DocumentService } from "../src/documents/document.service";
import { MatchRequestService } from "../src/matching/match-request.service";
import { toMatchResponse } from "../src/matching/match-response";
import { MatchingEngine } from "../src/matching/matching.engine";
import { MatchScorer } from "../src/matching/scoring/match-score";
import { MatchingError } from "../src/shared/errors";

const USAGE = "Usage: npm run score -- <resume.pdf|docx|txt> <job-description.txt>";

async function main(): Promise<void> {
  const [resumePath, jobPath] = process.argv.slice(2);
  if (!resumePath || !jobPath) {
    process.stderr.write(`${USAGE}\n`);
    process.exitCode = 2;
    return;
  }

  const env = loadEnv();
  // Logs go to stderr so stdout carries only the response JSON.
  const logger = createLogger({
    minLevel: env.logLevel,
    write: (line) => process.stderr.write(line),
  });
  const engine = new MatchingEngine(new MatchScorer(createEmbeddingCapability(env, logger), logger), logger);
  const service = new MatchRequestService(new DocumentService(logger), engine, logger);

  const [resumeBuffer, jobDescription] = await Promise.all([
    readFile(resumePath),
    readFile(jobPath, "utf-8"),
  ]);

  const result = await service.handle({
    resume: { buffer: resumeBuffer, fileName: path.basename(resumePath) },
    jobDescription,
  });
  process.stdout.write(`${JSON.stringify(toMatchResponse(result), null, 2)}\n`);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`score-files failed: ${message}\n`);
  process.exitCode = error instanceof MatchingError && error.statusCode === 400 ? 2 : 1;
});
