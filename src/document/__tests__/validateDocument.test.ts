import { describe, expect, it } from 'vitest'
import { decodeDocument, DocumentValidationError, parseDocument, validateDocument } from '../validateDocument'
import { checkCompatibility, parseVersion } from '../documentVersion'

const doc = (children: unknown[], extra: Record<string, unknown> = {}) => ({ id: 'screen', root: { children }, ...extra })

function errorsOf(raw: unknown) {
  const result = validateDocument(raw)
  if (result.ok) throw new Error('expected validation to fail')
  return result.errors.map((e) => [e.path, e.kind])
}

describe('validateDocument', () => {
  it('accepts a minimal document and fills defaults', () => {
    const result = validateDocument({ id: 'home', root: {} })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.document.version).toBe('0.1.0')
    expect(result.document.root.children).toEqual([])
    expect(result.warnings).toEqual([])
  })

  it('tags layout nodes by their wire type', () => {
    const document = parseDocument(
      doc([
        { type: 'vstack', children: [{ type: 'label', text: 'Hi' }, { type: 'spacer' }] },
        { type: 'forEach', items: 'items', template: { type: 'label', text: '${item}' } },
        { type: 'sectionLayout', sections: [{ layout: { type: 'list' }, children: [] }] },
      ]),
    )
    expect(document.root.children.map((n) => n.kind)).toEqual(['layout', 'forEach', 'sectionLayout'])

    const [stack, repeat] = document.root.children
    if (stack?.kind !== 'layout' || repeat?.kind !== 'forEach') throw new Error('unexpected node kinds')
    expect(stack.layout.children.map((n) => n.kind)).toEqual(['component', 'spacer'])
    expect(repeat.forEach.itemVariable).toBe('item')
    expect(repeat.forEach.indexVariable).toBe('index')
    expect(repeat.forEach.layout).toBe('vstack')
  })

  it('reports a missing field with its path', () => {
    expect(errorsOf({ root: {} })).toEqual([['id', 'missingField']])
  })

  it('reports type mismatches', () => {
    expect(errorsOf({ id: 'x', root: { children: 'nope' } })).toEqual([['root.children', 'typeMismatch']])
  })

  it('rejects a vertical alignment on a vstack', () => {
    expect(errorsOf(doc([{ type: 'vstack', alignment: 'top', children: [] }]))).toEqual([['root.children.0.alignment', 'invalidEnumValue']])
  })

  it('rejects min greater than max on a slider', () => {
    expect(errorsOf(doc([{ type: 'slider', bind: 'volume', minValue: 5, maxValue: 1 }]))).toEqual([['root.children.0.minValue', 'outOfRange']])
  })

  it('rejects text together with a data source', () => {
    expect(errorsOf(doc([{ type: 'label', text: 'a', dataSourceId: 'title' }]))).toEqual([['root.children.0', 'mutuallyExclusive']])
  })

  it('rejects absolute and fractional on the same dimension', () => {
    const raw = doc([], { styles: { card: { width: { absolute: 100, fractional: 0.5 } } } })
    expect(errorsOf(raw)).toEqual([['styles.card.width', 'mutuallyExclusive']])
  })

  it('reports nested errors inside repeater templates', () => {
    const raw = doc([{ type: 'forEach', items: 'rows', template: { type: 'shape' } }])
    expect(errorsOf(raw)).toEqual([['root.children.0.template.shapeType', 'missingField']])
  })

  it('requires an item template for data-driven sections', () => {
    const raw = doc([{ type: 'sectionLayout', sections: [{ layout: { type: 'grid' }, dataSource: 'photos' }] }])
    expect(errorsOf(raw)).toEqual([['root.children.0.sections.0.itemTemplate', 'missingField']])
  })

  it('rejects an unsupported major version', () => {
    expect(errorsOf({ id: 'x', version: '1.0', root: {} })).toEqual([['version', 'unsupportedVersion']])
  })

  it('warns about a newer minor version', () => {
    const result = validateDocument({ id: 'x', version: '0.3.0', root: {} })
    expect(result.ok).toBe(true)
    expect(result.warnings.map((w) => w.path)).toEqual(['version'])
  })

  it('warns about unknown style, action and data source references', () => {
    const result = validateDocument(
      doc(
        [
          { type: 'label', styleId: 'ghost', dataSourceId: 'nowhere' },
          { type: 'button', text: 'Go', styleId: '@primary', actions: { onTap: 'missing' } },
        ],
        { actions: { run: { type: 'sequence', steps: ['gone'] } } },
      ),
    )
    expect(result.ok).toBe(true)
    expect(result.warnings.map((w) => w.path)).toEqual([
      'actions.run.steps.0',
      'root.children.0.styleId',
      'root.children.0.dataSourceId',
      'root.children.1.actions.onTap',
    ])
  })

  it('throws a DocumentValidationError from parseDocument', () => {
    expect(() => parseDocument({ root: {} })).toThrow(DocumentValidationError)
    expect(() => parseDocument({ root: {} })).toThrow('id: Required')
  })

  it('reports unparseable JSON text', () => {
    const result = decodeDocument('{ nope')
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.errors.map((e) => [e.path, e.kind])).toEqual([['<root>', 'invalidFormat']])
  })
})

describe('document versions', () => {
  it('parses major.minor with an optional patch', () => {
    expect(parseVersion('0.1')).toEqual({ major: 0, minor: 1, patch: 0 })
    expect(parseVersion('2.10.3')).toEqual({ major: 2, minor: 10, patch: 3 })
    expect(parseVersion('v1')).toBeNull()
  })

  it('classifies compatibility against the supported version', () => {
    expect(checkCompatibility({ major: 0, minor: 1, patch: 4 })).toBe('compatible')
    expect(checkCompatibility({ major: 0, minor: 2, patch: 0 })).toBe('newerMinor')
    expect(checkCompatibility({ major: 1, minor: 0, patch: 0 })).toBe('incompatibleMajor')
  })
})
