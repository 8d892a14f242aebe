import { MatchResponseV1 } from "../shared/types/matching.types";

const PAGE_STYLE = `
    :root {
      --bg: #f5f5f7;
      --text: #1d1d22;
      --muted: #6b6f7b;
      --accent: #2f6fed;
      --border: rgba(0, 0, 0, 0.08);
    }
    * { box-sizing: border-box; }
    body {
      margin: 0;
      background: var(--bg);
      color: var(--text);
      font-family: "Inter", "Segoe UI", sans-serif;
      padding: 24px 12px;
    }
    .app { max-width: 900px; margin: 0 auto; display: grid; gap: 12px; }
    .card { border: 1px solid var(--border); border-radius: 14px; padding: 16px; background: #fff; }
    h1 { margin: 0 0 8px; font-size: 26px; }
    .muted { color: var(--muted); font-size: 13px; }
    .status { border-radius: 10px; padding: 10px; font-weight: 650; text-align: center; }
    .status.on { background: #dff3e4; color: #155724; }
    .status.off { background: #f8dfe1; color: #721c24; }
    label { display: block; font-weight: 650; margin: 12px 0 6px; }
    input[type="file"], textarea { width: 100%; padding: 10px; border: 1px solid var(--border); border-radius: 10px; font: inherit; }
    textarea { min-height: 140px; resize: vertical; }
    button, .back { background: var(--accent); color: #fff; border: 0; border-radius: 10px; padding: 10px 20px; font: inherit; cursor: pointer; text-decoration: none; display: inline-block; margin-top: 12px; }
    .stats { display: grid; grid-template-columns: repeat(auto-fit, minmax(180px, 1fr)); gap: 8px; }
    .stat { border: 1px solid var(--border); border-radius: 10px; padding: 12px; text-align: center; }
    .stat.overall { background: var(--accent); color: #fff; }
    .v { font-size: 32px; font-weight: 700; }
    .k { font-size: 12px; margin-top: 4px; }
    .section-title { margin: 0 0 8px; font-size: 16px; }
    ul { margin: 6px 0 12px; padding-left: 20px; }`;

export function renderIndexPage(semanticMatchingEnabled: boolean): string {
  const status = semanticMatchingEnabled
    ? '<div class="status on">Semantic Matching: Enabled</div>'
    : '<div class="status off">Semantic Matching: Disabled (Using keyword matching only)</div>';

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Resume Match Scorer</title>
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
  <div class="app">
    <section class="card">
      <h1>Resume Match Scorer</h1>
      ${status}
      <p class="muted">Upload a resume (PDF, DOCX or TXT), paste the job description and calculate the match score.</p>
      <form action="/match" method="post" enctype="multipart/form-data">
        <label for="resume">Resume</label>
        <input type="file" id="resume" name="resume" accept=".pdf,.docx,.txt" required />
        <label for="job_description">Job Description</label>
        <textarea id="job_description" name="job_description" placeholder="Paste the job description here..." required></textarea>
        <button type="submit">Calculate Match Score</button>
      </form>
    </section>
  </div>
</body>
</html>`;
}

export function renderResultPage(result: MatchResponseV1): string {
  const scores = result.match_scores;
  const resume = result.details.parsed_resume;
  const job = result.details.job_requirements;

  const statCards = [
    ["Overall Match", scores.overall_score, true],
    ["Skills Match (50% weight)", scores.skills_match, false],
    ["Experience Match (30% weight)", scores.experience_match, false],
    ["Education Match (20% weight)", scores.education_match, false],
  ] as const;
  const stats = statCards
    .map(
      ([label, value, overall]) =>
        `<div class="stat${overall ? " overall" : ""}"><div class="v">${escapeHtml(String(value))}%</div><div class="k">${escapeHtml(label)}</div></div>`,
    )
    .join("");

  const method = result.details.semantic_matching_used
    ? "Semantic + Keyword Matching"
    : "Keyword Matching Only";

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Match Results</title>
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
  <div class="app">
    <section class="card">
      <h1>${escapeHtml(result.candidate_name)} &rarr; ${escapeHtml(result.job_title)}</h1>
      <div class="stats">${stats}</div>
    </section>
    <section class="card">
      <h2 class="section-title">Resume Analysis</h2>
      <strong>Skills Found</strong>${renderList(resume.skills)}
      <strong>Experience Found</strong>${renderList(resume.experience)}
      <strong>Education Found</strong>${renderList(resume.education)}
    </section>
    <section class="card">
      <h2 class="section-title">Job Requirements</h2>
      <strong>Required Skills</strong>${renderList(job.required_skills)}
      <strong>Required Experience</strong>${renderList(job.required_experience)}
      <strong>Required Education</strong>${renderList(job.required_education)}
    </section>
    <section class="card">
      <div><strong>Matching Method:</strong> ${method}</div>
      <a class="back" href="/">Back to Upload</a>
    </section>
  </div>
</body>
</html>`;
}

export function renderList(items: readonly string[]): string {
  if (items.length === 0) {
    return '<div class="muted">None found</div>';
  }
  return `<ul>${items.map((item) => `<li>${escapeHtml(item)}</li>`).join("")}</ul>`;
}

export function escapeHtml(value: string): string {
  return String(value)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}
