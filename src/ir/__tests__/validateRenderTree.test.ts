import { describe, expect, it } from 'vitest'
import { parseDocument } from '../../document/validateDocument'
import { resolveDocument } from '../../resolution/resolver'
import { validateRenderTree } from '../validateRenderTree'

describe('validateRenderTree', () => {
  const document = parseDocument({
    id: 'profile',
    state: { name: 'Ada', notifications: true, volume: 0.4 },
    actions: { save: { type: 'setState', path: 'saved', value: true } },
    root: {
      edgeInsets: { top: 16 },
      children: [
        {
          type: 'vstack',
          spacing: 8,
          padding: { horizontal: 16 },
          children: [
            { type: 'label', text: 'Hello ${name}', style: { fontSize: 24, fontWeight: 'bold' } },
            { type: 'toggle', text: 'Notifications', bind: 'notifications' },
            { type: 'slider', bind: 'volume' },
            { type: 'image', image: { url: 'https://example.com/avatar.png' } },
            { type: 'divider' },
            { type: 'spacer', minLength: 4 },
            { type: 'button', text: 'Save', actions: { onTap: 'save' } },
          ],
        },
      ],
    },
  })

  it('accepts a resolved tree', () => {
    const { tree, errors } = resolveDocument(document, undefined, { log: () => {} })
    expect(errors).toEqual([])
    const result = validateRenderTree(tree)
    expect(result.ok).toBe(true)
  })

  it('reports the offending instance path', () => {
    const { tree } = resolveDocument(document, undefined, { log: () => {} })
    const broken = { ...tree, root: { ...tree.root, backgroundColor: { red: 2, green: 0, blue: 0, alpha: 1 } } }
    const result = validateRenderTree(broken)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBe('/root/backgroundColor/red must be <= 1')
  })
})
