import { describe, expect, it } from 'vitest'
import { canonicalPath, exceedsIndexGap, MAX_INDEX_GAP, parentPaths, parseKeyPath, pathsOverlap, rootKey, setByPath } from '../keyPath'

describe('keyPath', () => {
  it('parses dotted and bracketed segments', () => {
    expect(parseKeyPath('items[0].title')).toEqual(['items', 0, 'title'])
    expect(parseKeyPath('items.0.title')).toEqual(['items', 0, 'title'])
    expect(parseKeyPath('  ')).toEqual([])
    expect(canonicalPath('a[1][2].b')).toBe('a.1.2.b')
    expect(rootKey('user.name')).toBe('user')
  })

  it('lists ancestor paths', () => {
    expect(parentPaths('a.b.c')).toEqual(['a', 'a.b'])
    expect(parentPaths('a')).toEqual([])
  })

  it('treats prefix paths as overlapping', () => {
    expect(pathsOverlap('user', 'user.name')).toBe(true)
    expect(pathsOverlap('user.name', 'user')).toBe(true)
    expect(pathsOverlap('user.name', 'user.age')).toBe(false)
    expect(pathsOverlap('items[1]', 'items.1.title')).toBe(true)
    expect(pathsOverlap('userName', 'user')).toBe(false)
  })

  it('writes without mutating the input', () => {
    const root = { user: { name: 'Ada' }, other: { x: 1 } }
    const next = setByPath(root, 'user.name', 'Grace')
    expect(next).toEqual({ user: { name: 'Grace' }, other: { x: 1 } })
    expect(root.user.name).toBe('Ada')
    expect(next.other).toBe(root.other)
  })

  it('pads arrays with null and removes keys on undefined', () => {
    expect(setByPath({}, 'list[2]', 'c')).toEqual({ list: [null, null, 'c'] })
    expect(setByPath({ a: 1, b: 2 }, 'a', undefined)).toEqual({ b: 2 })
  })

  it('leaves the root untouched when an index is too far past the end', () => {
    const root = { list: [1], deep: { rows: [] } }
    expect(exceedsIndexGap(root, `list.${MAX_INDEX_GAP + 1}`)).toBe(false)
    expect(exceedsIndexGap(root, `list.${MAX_INDEX_GAP + 2}`)).toBe(true)
    expect(setByPath(root, 'deep.rows[99999].x', 1)).toBe(root)
    expect(setByPath(root, 'fresh.4294967296', 1)).toBe(root)
  })
})
