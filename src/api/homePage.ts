import { formatScheduleLines, summarizeResult } from "../domain/scheduleFormat";
import { ScheduleOutcome } from "../services/scheduleService";

export interface HomeFormValues {
  courses: string;
  start: string;
  end: string;
  days: string;
}

export const DEFAULT_FORM_VALUES: HomeFormValues = {
  courses: "",
  start: "09:00",
  end: "16:00",
  days: "MTWRF",
};

export interface HomePageState {
  form: HomeFormValues;
  outcome?: ScheduleOutcome;
  errorMessage?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function renderResults(state: HomePageState): string {
  if (state.errorMessage) {
    return `<h2>Could not build schedules</h2>\n<p class="error">${escapeHtml(state.errorMessage)}</p>`;
  }
  if (!state.outcome) return "";

  const { result, cap } = state.outcome;
  const heading = `<h2>${escapeHtml(summarizeResult(result, cap))}</h2>`;
  if (result.schedules.length === 0) {
    return `${heading}\n<p><em>No schedule fits those constraints.</em></p>`;
  }

  const blocks = result.schedules.map((schedule, index) => {
    const lines = formatScheduleLines(schedule).map(escapeHtml).join("\n");
    return `<pre><strong>Schedule #${index + 1}</strong>\n${lines}</pre>`;
  });
  return [heading, ...blocks].join("\n");
}

/**
 * Render the single-page form and, after a submit, the numbered schedules
 */
export function renderHomePage(state: HomePageState): string {
  const { form } = state;

  return `<!doctype html>
<html>
<head>
  <meta charset="utf-8"/>
  <title>Auto Schedule Builder</title>
  <style>
    body{font-family:system-ui, sans-serif;max-width:720px;margin:40px auto;padding:0 1rem}
    label{display:block;margin-top:1rem;font-weight:600}
    input,button{width:100%;padding:.5rem;font-size:1rem}
    button{margin-top:1.25rem;cursor:pointer;border:none;border-radius:.5rem;background:#d62828;color:#fff}
    pre{background:#f7f7f7;padding:1rem;border-radius:.5rem;white-space:pre-line}
    h2{margin-top:2rem;color:#333}
    .error{color:#d62828}
  </style>
</head>
<body>
  <h1>Auto Schedule Builder</h1>
  <form method="post">
    <label>Courses (space-separated)</label>
    <input name="courses" placeholder="CS280 CS241 MATH333" value="${escapeHtml(form.courses)}" required>

    <label>Earliest start (HH:MM)</label>
    <input type="time" name="start" value="${escapeHtml(form.start)}">

    <label>Latest finish (HH:MM)</label>
    <input type="time" name="end" value="${escapeHtml(form.end)}">

    <label>Days allowed (e.g. MTWRF)</label>
    <input name="days" value="${escapeHtml(form.days)}">

    <button type="submit">Find schedules</button>
  </form>
${renderResults(state)}
</body>
</html>
`;
}
