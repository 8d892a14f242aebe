export const RESUME_TEXT = [
  "Jane Doe",
  "jane@example.com",
  "Experience",
  "- Backend Engineer at Acme, 4 years",
  "- Intern at Beta, 1 year",
  "Skills",
  "- TypeScript, Node.js",
  "- PostgreSQL",
  "Education",
  "- BSc in Computer Science",
].join("\n");

export const JOB_TEXT = [
  "Position: Backend Engineer",
  "We need 5+ years of experience with Node.js.",
  "Skills: TypeScript, PostgreSQL; Docker",
  "- Kubernetes",
  "",
  "Education: Bachelor's degree in Computer Science, or equivalent.",
].join("\n");
