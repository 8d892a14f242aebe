import assert from "node:assert/strict";
import { test } from "node:test";
import { MatchResponseV1 } from "../../shared/types/matching.types";
import { escapeHtml, renderIndexPage, renderList, renderResultPage } from "../../web/match.page";

const RESPONSE: MatchResponseV1 = {
  candidate_name: "<Jane>",
  job_title: "Backend Engineer",
  match_scores: { experience_match: 85, skills_match: 50, education_match: 33, overall_score: 57 },
  details: {
    parsed_resume: { name: "<Jane>", experience: [], skills: ["C++ <dev>"], education: [] },
    job_requirements: { title: "Backend Engineer", required_experience: ["5 of"], required_skills: [], required_education: [] },
    semantic_matching_used: false,
  },
};

test("escapes HTML special characters", () => {
  assert.equal(escapeHtml(`<b>"x" & 'y'</b>`), "&lt;b&gt;&quot;x&quot; &amp; &#039;y&#039;&lt;/b&gt;");
});

test("renders lists with a placeholder when empty", () => {
  assert.equal(renderList([]), '<div class="muted">None found</div>');
  assert.equal(renderList(["C++ <dev>"]), "<ul><li>C++ &lt;dev&gt;</li></ul>");
});

test("shows the semantic matching status on the upload form", () => {
  assert.ok(renderIndexPage(true).includes('<div class="status on">Semantic Matching: Enabled</div>'));
  assert.ok(
    renderIndexPage(false).includes(
      '<div class="status off">Semantic Matching: Disabled (Using keyword matching only)</div>',
    ),
  );
});

test("renders escaped results", () => {
  const html = renderResultPage(RESPONSE);
  assert.ok(html.includes("<h1>&lt;Jane&gt; &rarr; Backend Engineer</h1>"));
  assert.ok(html.includes('<div class="stat overall"><div class="v">57%</div><div class="k">Overall Match</div></div>'));
  assert.ok(html.includes("<strong>Skills Found</strong><ul><li>C++ &lt;dev&gt;</li></ul>"));
  assert.ok(html.includes("<strong>Matching Method:</strong> Keyword Matching Only"));
});
