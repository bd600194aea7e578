export interface DiagramPageOptions {
  title?: string;
  /** Mermaid ESM bundle loaded by the viewer's browser */
  mermaidUrl?: string;
}

const DEFAULT_MERMAID_URL = 'https://cdn.jsdelivr.net/npm/mermaid@10/dist/mermaid.esm.min.mjs';

/**
 * Standalone HTML page that renders a Mermaid diagram in the browser. Nothing
 * is fetched while generating it; the page loads Mermaid when opened.
 */
export function generateDiagramHTML(
  mermaid: string,
  options: DiagramPageOptions = {}
): string {
  const {
    title = 'Python Import Graph',
    mermaidUrl = DEFAULT_MERMAID_URL,
  } = options;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <script type="module">
    import mermaid from '${mermaidUrl}';
    mermaid.initialize({ startOnLoad: true, theme: 'dark' });
  </script>
  <style>
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body {
      background: #0a0a1a;
      color: #e0e0e0;
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif;
    }
    #header {
      padding: 16px;
      background: #1a1a2e;
      border-bottom: 1px solid #2a2a4a;
    }
    #header h2 {
      font-size: 18px;
      font-weight: 600;
      color: #4a9eff;
      margin-bottom: 8px;
    }
    #legend {
      font-size: 13px;
      color: #888;
    }
    .mermaid {
      padding: 24px;
      overflow: auto;
    }
  </style>
</head>
<body>
  <div id="header">
    <h2>${escapeHtml(title)}</h2>
    <div id="legend">Red dashed links are imports that take part in a cycle.</div>
  </div>
  <pre class="mermaid">
${escapeHtml(mermaid)}
  </pre>
</body>
</html>
`;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}
