import { describe, expect, it } from 'vitest'
import { parseDocument } from '../../document/validateDocument'
import { resolveDocument } from '../../resolution/resolver'
import { DocumentRuntime } from '../../runtime/documentRuntime'
import { DebugRenderer, renderDebugText } from '../debugRenderer'

describe('DebugRenderer', () => {
  const raw = {
    id: 'counter',
    state: { count: 2 },
    actions: { increment: { type: 'setState', path: 'count', value: '${count} + 1' } },
    root: {
      children: [
        {
          type: 'vstack',
          id: 'main',
          spacing: 12,
          children: [
            { type: 'label', text: 'Count: ${count}' },
            { type: 'spacer' },
            { type: 'button', text: 'Add', actions: { onTap: 'increment' } },
          ],
        },
      ],
    },
  }

  it('prints one indented line per node', () => {
    const { tree } = resolveDocument(parseDocument(raw), undefined, { log: () => {} })
    expect(renderDebugText(tree)).toBe(
      [
        'root counter ir=0.1.0 background=#ffffff',
        '  vstack#main spacing=12',
        '    text "Count: 2"',
        '    spacer',
        '    button "Add" onTap=@increment',
      ].join('\n'),
    )
  })

  it('renders through a runtime with a custom indent', () => {
    const runtime = DocumentRuntime.load(raw, { log: () => {} })
    const lines = runtime.render(new DebugRenderer({ indent: '\t' })).split('\n')
    expect(lines[1]).toBe('\tvstack#main spacing=12')
    expect(lines[2]).toBe('\t\ttext "Count: 2"')
  })

  it('prints sections with headers and items', () => {
    const { tree } = resolveDocument(
      parseDocument({
        id: 's',
        root: {
          children: [
            {
              type: 'sectionLayout',
              sections: [{ id: 'top', layout: { type: 'list' }, header: { type: 'label', text: 'Header' }, children: [{ type: 'divider' }] }],
            },
          ],
        },
      }),
      undefined,
      { log: () => {} },
    )
    expect(renderDebugText(tree).split('\n').slice(1)).toEqual([
      '  sectionLayout sections=1',
      '    section#top list items=1',
      '      header:',
      '        text "Header"',
      '      divider #c6c6c8',
    ])
  })
})
