import { describe, it, expect } from 'vitest';
import { generateMermaid } from '../src/viz/mermaid.js';
import { generateDiagramHTML } from '../src/viz/generate-html.js';

describe('generateMermaid', () => {
  it('writes plain links first and styles cycle links', () => {
    const mermaid = generateMermaid(
      {
        'a.py': ['b.py'],
        'b.py': ['c.py', 'a.py'],
        'c.py': [],
        'd.py': [],
      },
      [['a.py', 'b.py', 'a.py']]
    );

    expect(mermaid).toBe([
      'graph TD;',
      '    "d.py";',
      '    "b.py" --> "c.py";',
      '    "a.py" --> "b.py";',
      '    "b.py" --> "a.py";',
      '    linkStyle 1 stroke:red,stroke-width:2px,stroke-dasharray: 5 5;',
      '    linkStyle 2 stroke:red,stroke-width:2px,stroke-dasharray: 5 5;',
    ].join('\n'));
  });

  it('renders a graph without cycles', () => {
    expect(generateMermaid({ 'main.py': ['util.py'], 'util.py': [] }, [])).toBe(
      'graph TD;\n    "main.py" --> "util.py";'
    );
  });
});

describe('generateDiagramHTML', () => {
  it('embeds the diagram and escapes the title', () => {
    const html = generateDiagramHTML('graph TD;\n    "a.py" --> "b.py";', { title: 'Deps <core>' });

    expect(html).toContain('<title>Deps &lt;core&gt;</title>');
    expect(html).toContain('"a.py" --&gt; "b.py";');
    expect(html).toContain("import mermaid from 'https://cdn.jsdelivr.net/npm/mermaid@10/dist/mermaid.esm.min.mjs';");
  });
});
