import { escapeHtml } from './escape';

const STYLES = `
  :root { --primary: #f9a825; --primary-light: #ffcc66; --bg: #0a0f2a; --bg-end: #2a1a40;
          --text: #f0e6d2; --subtle-bg: #101535; --border: #333858; }
  * { box-sizing: border-box; margin: 0; padding: 0; }
  body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Arial, sans-serif;
         line-height: 1.7; color: var(--text);
         background: linear-gradient(90deg, var(--bg) 0%, var(--bg-end) 100%); min-height: 100vh; }
  .container { max-width: 1140px; width: 90%; margin: 0 auto; padding: 0 1rem; }
  .app-header { border-bottom: 1px solid var(--border); padding: 1.5rem 0; margin-bottom: 2rem; text-align: center; }
  .app-header .logo { font-size: 1.8rem; font-weight: 700; color: var(--primary-light); text-decoration: none; }
  .content-section { padding: 3rem 0; }
  .content-section h1, .content-section h2 { text-align: center; margin-bottom: 1.5rem; }
  .content-section p { text-align: center; margin: 0 auto 2rem auto; max-width: 700px; }
  .btn { display: inline-block; padding: 0.8rem 1.8rem; border-radius: 50px; text-decoration: none;
         font-weight: 600; cursor: pointer; border: none; margin: 0.25rem; }
  .btn-primary { background: var(--primary); color: var(--bg); }
  .btn-secondary { background: transparent; color: var(--primary-light); border: 1px solid var(--primary-light); }
  .cta-buttons { display: flex; justify-content: center; gap: 1rem; margin-top: 2rem; }
  .table { width: 100%; border-collapse: collapse; margin: 2rem 0; background: var(--subtle-bg); }
  .table th, .table td { padding: 1rem; text-align: left; border-bottom: 1px solid var(--border); }
  .table th { color: var(--primary-light); }
  .form-group { margin-bottom: 1.5rem; }
  .form-group input[type="text"] { width: 100%; padding: 0.75rem; border: 1px solid var(--border);
         border-radius: 4px; background: var(--subtle-bg); color: var(--text); }
  .form-actions { margin-top: 2rem; display: flex; gap: 1rem; }
  .error-message { color: #ff6b6b; font-weight: 500; margin-bottom: 1rem; }
`;

/** Wraps page content in the shared document shell. `body` must already be escaped. */
export function renderDocument(title: string, body: string): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(title)}</title>`,
    `<style>${STYLES}</style>`,
    '</head>',
    '<body>',
    '<header class="app-header"><a href="/" class="logo">Items</a></header>',
    '<main class="container"><section class="content-section"><div class="container">',
    body,
    '</div></section></main>',
    '</body>',
    '</html>',
  ].join('\n');
}
