import assert from "node:assert/strict";
import { once } from "node:events";
import { Server } from "node:http";
import { after, before, test } from "node:test";
import { createApp } from "../../app";
import { EnvConfig, loadEnv } from "../../config/env";
import { Logger, noopLogger } from "../../config/logger";
import { parseMatchResponse } from "../../matching/match-response";
import { JOB_TEXT, RESUME_TEXT } from "../fixtures";

interface RunningApp {
  baseUrl: string;
  close(): Promise<void>;
}

async function startApp(env: EnvConfig, logger: Logger = noopLogger): Promise<RunningApp> {
  const { app } = createApp(env, { logger, embeddings: null });
  const server: Server = app.listen(0);
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: async () => {
      server.closeAllConnections();
      server.close();
      await once(server, "close");
    },
  };
}

function matchForm(options: { resume?: string; jobDescription?: string }): FormData {
  const form = new FormData();
  if (options.resume !== undefined) {
    form.append("resume", new Blob([options.resume], { type: "text/plain" }), "jane.txt");
  }
  if (options.jobDescription !== undefined) {
    form.append("job_description", options.jobDescription);
  }
  return form;
}

const env = loadEnv({});
let running: RunningApp;

before(async () => {
  running = await startApp(env);
});

after(async () => {
  await running.close();
});

test("GET /health reports status, semantic matching and version", async () => {
  const response = await fetch(`${running.baseUrl}/health`);
  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), {
    status: "healthy",
    semantic_matching: false,
    version: "1.0.0",
  });
});

test("GET / serves the upload form", async () => {
  const response = await fetch(`${running.baseUrl}/`);
  assert.equal(response.status, 200);
  assert.match(response.headers.get("content-type") ?? "", /^text\/html/);
  assert.match(await response.text(), /<h1>Resume Match Scorer<\/h1>/);
});

test("POST /match answers JSON when the client accepts it", async () => {
  const response = await fetch(`${running.baseUrl}/match`, {
    method: "POST",
    headers: { Accept: "application/json" },
    body: matchForm({ resume: RESUME_TEXT, jobDescription: JOB_TEXT.split("\n").join("\r\n") }),
  });
  assert.equal(response.status, 200);
  const result = parseMatchResponse(await response.json());
  assert.equal(result.parsedResume.name, "Jane Doe");
  assert.equal(result.jobRequirements.title, "Backend Engineer");
  assert.deepEqual(result.scores, {
    experienceMatch: 85,
    skillsMatch: 50,
    educationMatch: 33,
    overallScore: 57,
  });
  assert.equal(result.semanticMatchingUsed, false);
});

test("POST /match answers HTML to a browser form post", async () => {
  const response = await fetch(`${running.baseUrl}/match`, {
    method: "POST",
    body: matchForm({ resume: RESUME_TEXT, jobDescription: JOB_TEXT }),
  });
  assert.equal(response.status, 200);
  assert.match(response.headers.get("content-type") ?? "", /^text\/html/);
  assert.match(await response.text(), /<h1>Jane Doe &rarr; Backend Engineer<\/h1>/);
});

test("POST /match rejects a request without a resume file", async () => {
  const response = await fetch(`${running.baseUrl}/match`, {
    method: "POST",
    body: matchForm({ jobDescription: JOB_TEXT }),
  });
  assert.equal(response.status, 400);
  assert.deepEqual(await response.json(), { error: "No resume file provided" });
});

test("POST /match with a JSON body has no file and is rejected", async () => {
  const response = await fetch(`${running.baseUrl}/match`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ job_description: JOB_TEXT }),
  });
  assert.equal(response.status, 400);
  assert.deepEqual(await response.json(), { error: "No resume file provided" });
});

test("POST /match rejects a request without a job description", async () => {
  const response = await fetch(`${running.baseUrl}/match`, {
    method: "POST",
    body: matchForm({ resume: RESUME_TEXT, jobDescription: "   " }),
  });
  assert.equal(response.status, 400);
  assert.deepEqual(await response.json(), { error: "Job description is required" });
});

test("POST /match rejects files over the upload limit", async () => {
  const small = await startApp({ ...env, maxUploadBytes: 16 });
  try {
    const response = await fetch(`${small.baseUrl}/match`, {
      method: "POST",
      body: matchForm({ resume: RESUME_TEXT, jobDescription: JOB_TEXT }),
    });
    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), { error: "File too large" });
  } finally {
    await small.close();
  }
});

test("POST /match turns unexpected failures into a 500", async () => {
  const failing = await startApp(env, {
    ...noopLogger,
    info(message) {
      if (message === "Resume matched") {
        throw new Error("log sink unavailable");
      }
    },
  });
  try {
    const response = await fetch(`${failing.baseUrl}/match`, {
      method: "POST",
      headers: { Accept: "application/json" },
      body: matchForm({ resume: RESUME_TEXT, jobDescription: JOB_TEXT }),
    });
    assert.equal(response.status, 500);
    assert.deepEqual(await response.json(), { error: "An error occurred: log sink unavailable" });
  } finally {
    await failing.close();
  }
});
