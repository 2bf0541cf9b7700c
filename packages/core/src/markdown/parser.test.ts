import { describe, expect, it } from 'vitest'
import type { Document } from './document.js'
import { EncodingError } from './errors.js'
import { childrenOf, type NodeId, type NodeType } from './nodes.js'
import { parse, safeParse } from './parser.js'

function types(doc: Document, id: NodeId): NodeType[] {
  return doc.children(id).map((child) => doc.node(child).type)
}

function leaves(doc: Document): string {
  let out = ''
  doc.visit({
    enter: (node) => {
      if (childrenOf(node).length === 0) out += doc.source.slice(node.start, node.end)
    },
  })
  return out
}

const TASKS = `# Spec

Intro line

- [ ] 1.1 First
- [x] 1.2 Second
  - [ ] 1.2.1 Nested
`

describe('parse', () => {
  it('should build top-level blocks', () => {
    const doc = parse(TASKS)
    expect(types(doc, doc.root)).toEqual(['header', 'blankLine', 'paragraph', 'blankLine', 'list'])
    const header = doc.node(doc.children(doc.root)[0])
    expect(header).toMatchObject({ type: 'header', level: 1, text: 'Spec', start: 0, end: 7 })
  })

  it('should parse task items with IDs and nesting', () => {
    const doc = parse(TASKS)
    expect(doc.tasks().map((task) => [task.id, task.checked, task.description, task.checkbox])).toEqual([
      ['1.1', false, 'First', 23],
      ['1.2', true, 'Second', 39],
      ['1.2.1', false, 'Nested', 58],
    ])

    const list = doc.children(doc.root)[4]
    expect(types(doc, list)).toEqual(['taskItem', 'taskItem'])
    const second = doc.children(list)[1]
    expect(types(doc, second)).toEqual(['marker', 'text', 'marker', 'list'])
  })

  it('should cover the source with leaf spans', () => {
    const samples = [
      TASKS,
      '',
      'no newline at end',
      '## Title ##\n\n```ts\nconst a = 1\n```\n\n1. one\n2. two\n\n\n',
      '- a\ncontinued\n\n  indented child\n- b\n',
      'See [[auth#login|Login]] and `code` and **bold** *it*\r\n',
      '~~~\nunclosed fence\n- not a list\n',
    ]
    for (const sample of samples) {
      const doc = parse(sample)
      expect(leaves(doc)).toBe(sample)
      expect(doc.node(doc.root)).toMatchObject({ start: 0, end: sample.length })
    }
  })

  it('should treat x and X as checked', () => {
    const doc = parse('- [X] Upper\n- [x] Lower\n- [ ] Open\n')
    expect(doc.tasks().map((task) => task.checked)).toEqual([true, true, false])
  })

  it('should report a missing task ID as null', () => {
    const doc = parse('- [ ] Write docs\n')
    expect(doc.tasks()[0]).toMatchObject({ id: null, description: 'Write docs' })
  })

  it('should strip the closing hash sequence from header text', () => {
    const doc = parse('## Title ##\n')
    expect(doc.node(doc.children(doc.root)[0])).toMatchObject({ level: 2, text: 'Title' })
  })

  it('should keep seven hashes as a paragraph', () => {
    const doc = parse('####### x\n')
    expect(types(doc, doc.root)).toEqual(['paragraph'])
  })

  it('should parse fenced code blocks', () => {
    const doc = parse('```ts title\nconst a = 1\n```\n')
    expect(doc.node(doc.children(doc.root)[0])).toMatchObject({
      type: 'codeBlock',
      lang: 'ts',
      info: 'ts title',
      content: 'const a = 1\n',
      fence: '```',
      closed: true,
    })
  })

  it('should run an unclosed fence to the end of the input', () => {
    const source = '~~~\nx\n# not a header\n'
    const doc = parse(source)
    expect(types(doc, doc.root)).toEqual(['codeBlock'])
    expect(doc.node(doc.children(doc.root)[0])).toMatchObject({
      closed: false,
      content: 'x\n# not a header\n',
      end: source.length,
    })
  })

  it('should start a new list when the marker kind changes', () => {
    const doc = parse('- a\n1. b\n2) c\n')
    const lists = doc.children(doc.root).map((id) => doc.node(id))
    expect(lists.map((list) => list.type === 'list' && list.ordered)).toEqual([false, true])
    expect(types(doc, doc.children(doc.root)[1])).toEqual(['listItem', 'listItem'])
  })

  it('should nest by marker column with tabs advancing to four', () => {
    const doc = parse('- a\n\t- b\n')
    const list = doc.children(doc.root)[0]
    const first = doc.children(list)[0]
    expect(types(doc, list)).toEqual(['listItem'])
    expect(types(doc, first)).toEqual(['marker', 'text', 'marker', 'list'])
  })

  it('should continue an item lazily with a following text line', () => {
    const doc = parse('- item\ncontinued\n')
    const item = doc.children(doc.children(doc.root)[0])[0]
    expect(doc.node(item)).toMatchObject({ type: 'listItem', text: 'item' })
    expect(types(doc, item)).toEqual(['marker', 'text', 'marker', 'paragraph'])
  })

  it('should attach blank lines to the container of the next line', () => {
    const doc = parse('- a\n\n  child paragraph\n\nafter\n')
    expect(types(doc, doc.root)).toEqual(['list', 'blankLine', 'paragraph'])
    const item = doc.children(doc.children(doc.root)[0])[0]
    expect(types(doc, item)).toEqual(['marker', 'text', 'marker', 'blankLine', 'paragraph'])
  })

  it('should close lists at a header', () => {
    const doc = parse('- a\n## Next\n')
    expect(types(doc, doc.root)).toEqual(['list', 'header'])
  })

  it('should parse inline content', () => {
    const doc = parse('See [[auth#login|Login flow]] and `a b` plus **bold** and *it*.\n')
    const paragraph = doc.children(doc.root)[0]
    expect(types(doc, paragraph)).toEqual([
      'text',
      'wikiLink',
      'text',
      'inlineCode',
      'text',
      'strong',
      'text',
      'emphasis',
      'text',
      'marker',
    ])
    const [, link, , code] = doc.children(paragraph)
    expect(doc.node(link)).toMatchObject({ target: 'auth', anchor: 'login', display: 'Login flow' })
    expect(doc.node(code)).toMatchObject({ code: 'a b' })
  })

  it('should keep unmatched delimiters as text', () => {
    const doc = parse('a * b\n')
    const paragraph = doc.children(doc.root)[0]
    expect(types(doc, paragraph)).toEqual(['text', 'marker'])
    expect(doc.node(doc.children(paragraph)[0])).toMatchObject({ type: 'text', value: 'a * b' })
  })

  it('should match code spans by run length', () => {
    const doc = parse('``a`b``\n')
    const paragraph = doc.children(doc.root)[0]
    expect(doc.node(doc.children(paragraph)[0])).toMatchObject({ type: 'inlineCode', code: 'a`b' })
  })

  it('should decode UTF-8 bytes', () => {
    const doc = parse(new TextEncoder().encode('# Héllo\n'))
    expect(doc.node(doc.children(doc.root)[0])).toMatchObject({ text: 'Héllo' })
  })

  it('should return an encoding error from safeParse', () => {
    const result = safeParse(new Uint8Array([0x23, 0x20, 0xc3, 0x28]))
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error).toBeInstanceOf(EncodingError)
      expect(result.error.code).toBe('ENCODING')
    }
  })

  it('should give independent arenas to separate parses', () => {
    const a = parse('# A\n')
    const b = parse('# B\n')
    expect(a.arena).not.toBe(b.arena)
    expect(a.print()).toBe('# A\n')
    expect(b.print()).toBe('# B\n')
  })
})
