import { describe, expect, it } from 'vitest'
import { parse } from './parser.js'

const SPEC = `# Auth

## Requirements

### Requirement: Login
Text [[auth]]

#### Scenario: Valid
- WHEN ok

## Notes
`

describe('PositionIndex', () => {
  const doc = parse(SPEC)

  it('should find the innermost node at an offset', () => {
    expect(doc.nodeAt(55)?.node).toMatchObject({ type: 'wikiLink', target: 'auth', start: 53, end: 61 })
    expect(doc.nodeAt(48)?.node).toMatchObject({ type: 'text', value: 'Text ' })
    expect(doc.nodeAt(SPEC.length)).toBeUndefined()
    expect(doc.nodeAt(-1)).toBeUndefined()
  })

  it('should list the nodes at an offset outermost first', () => {
    expect(doc.nodesAt(55).map(({ node }) => node.type)).toEqual(['document', 'paragraph', 'wikiLink'])
  })

  it('should list the nodes overlapping a range in document order', () => {
    expect(doc.nodesInRange(48, 63).map(({ node }) => node.type)).toEqual([
      'document',
      'paragraph',
      'text',
      'wikiLink',
      'marker',
      'blankLine',
    ])
    expect(doc.nodesInRange(10, 10)).toEqual([])
  })

  it('should find header sections by outline', () => {
    expect(doc.positionIndex.sectionsAt(86).map((section) => section.header.text)).toEqual([
      'Auth',
      'Requirements',
      'Requirement: Login',
      'Scenario: Valid',
    ])
    expect(doc.enclosingSection(86)).toMatchObject({ start: 63, end: 95 })
    expect(doc.enclosingSection(10)).toMatchObject({ start: 8, end: 95 })
    expect(doc.enclosingSection(3)).toMatchObject({ start: 0, end: SPEC.length })
  })

  it('should filter sections by header', () => {
    expect(doc.enclosingSection(86, (header) => header.level === 3)?.header.text).toBe('Requirement: Login')
    expect(doc.enclosingSection(100, (header) => header.level === 3)).toBeUndefined()
  })

  it('should be built once per document', () => {
    expect(doc.positionIndex).toBe(doc.positionIndex)
    expect(doc.ancestry).toBe(doc.ancestry)
    expect(parse(SPEC).positionIndex).not.toBe(doc.positionIndex)
  })
})
