/**
 * Shared stylesheet for every generated page (dark theme).
 */
export const STYLESHEET = `:root {
  --bg: #0f172a;
  --card-bg: #1e293b;
  --card-border: #334155;
  --text: #e2e8f0;
  --text-muted: #94a3b8;
  --accent: #6366f1;
  --danger: #f43f5e;
}
* { box-sizing: border-box; margin: 0; padding: 0; }
body {
  font-family: 'Inter', 'Noto Sans SC', -apple-system, BlinkMacSystemFont, sans-serif;
  background: var(--bg);
  color: var(--text);
  line-height: 1.6;
  padding: 2rem;
  max-width: 900px;
  margin: 0 auto;
}
a { color: var(--accent); text-decoration: none; }
header {
  text-align: center;
  margin-bottom: 2.5rem;
  padding-bottom: 1.5rem;
  border-bottom: 1px solid var(--card-border);
}
h1 { font-size: 2.2rem; margin-bottom: 0.5rem; }
.subtitle, .stats { color: var(--text-muted); }
.date { font-size: 1.2rem; color: var(--accent); margin: 0.75rem 0; }
.day-nav { margin-top: 1rem; display: flex; gap: 1rem; justify-content: center; font-size: 0.9rem; }
.paper-card {
  background: var(--card-bg);
  border: 1px solid var(--card-border);
  border-radius: 12px;
  padding: 1.5rem;
  margin-bottom: 1.5rem;
  transition: border-color 0.2s;
}
.paper-card:hover { border-color: var(--accent); }
.paper-header { display: flex; align-items: center; gap: 0.5rem; margin-bottom: 0.75rem; }
.category-badge {
  background: var(--accent);
  color: white;
  padding: 0.2rem 0.7rem;
  border-radius: 20px;
  font-size: 0.8rem;
}
.score-badge {
  border: 1px solid var(--accent);
  color: var(--accent);
  padding: 0.1rem 0.6rem;
  border-radius: 20px;
  font-size: 0.8rem;
}
.paper-id { color: var(--text-muted); font-size: 0.85rem; font-family: monospace; }
.paper-title { font-size: 1.15rem; line-height: 1.4; margin-bottom: 0.5rem; }
.paper-title a { color: var(--text); }
.paper-title a:hover { color: var(--accent); }
.paper-title-zh, .paper-authors { color: var(--text-muted); margin-bottom: 0.5rem; }
.paper-authors { font-size: 0.9rem; margin-bottom: 1rem; }
.paper-summary {
  background: rgba(99, 102, 241, 0.1);
  border-radius: 8px;
  padding: 1rem;
  margin-bottom: 1rem;
}
.summary-section { margin-bottom: 0.5rem; }
.summary-section:last-child { margin-bottom: 0; }
.summary-section strong { color: var(--accent); }
.summary-failed { color: var(--danger); background: rgba(244, 63, 94, 0.1); }
.paper-abstract { margin-bottom: 1rem; }
.paper-abstract summary { cursor: pointer; color: var(--text-muted); font-size: 0.9rem; }
.paper-abstract p { margin-top: 0.75rem; font-size: 0.9rem; color: var(--text-muted); }
.paper-links { display: flex; gap: 0.75rem; }
.link-btn {
  padding: 0.4rem 1rem;
  background: var(--card-border);
  color: var(--text);
  border-radius: 6px;
  font-size: 0.85rem;
}
.link-btn:hover { background: var(--accent); }
.archive-link {
  display: flex;
  justify-content: space-between;
  padding: 1rem;
  background: var(--card-bg);
  border: 1px solid var(--card-border);
  border-radius: 8px;
  margin-bottom: 0.5rem;
  color: var(--text);
}
.archive-link:hover { border-color: var(--accent); }
.archive-count, .empty { color: var(--text-muted); }
footer {
  text-align: center;
  padding-top: 2rem;
  margin-top: 2rem;
  border-top: 1px solid var(--card-border);
  color: var(--text-muted);
  font-size: 0.9rem;
}
@media (max-width: 600px) {
  body { padding: 1rem; }
  h1 { font-size: 1.75rem; }
  .paper-card { padding: 1rem; }
}
`;
