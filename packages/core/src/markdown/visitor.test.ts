import { describe, expect, it } from 'vitest'
import { LineIndex } from './line-index.js'
import { parse } from './parser.js'
import { matchTaskLine } from './task-line.js'

const SOURCE = `# Title

## First
- [ ] 1 one
  - [x] 1.1 nested

## Second
- [ ] 2 two
`

describe('Document#visit', () => {
  it('should visit nodes in pre-order', () => {
    const doc = parse(SOURCE)
    const seen: string[] = []
    doc.visit({
      header: (node) => {
        seen.push(`h${node.level}`)
      },
      taskItem: (node) => {
        seen.push(node.id ?? '?')
      },
    })
    expect(seen).toEqual(['h1', 'h2', '1', '1.1', 'h2', '2'])
  })

  it('should skip subtrees', () => {
    const doc = parse(SOURCE)
    const ids: string[] = []
    doc.visit({
      taskItem: (node) => {
        ids.push(node.id ?? '?')
        return 'skip'
      },
    })
    expect(ids).toEqual(['1', '2'])
  })

  it('should stop the traversal', () => {
    const doc = parse(SOURCE)
    const headers: string[] = []
    doc.visit({
      header: (node) => {
        headers.push(node.text)
        if (node.level === 2) return 'stop'
      },
    })
    expect(headers).toEqual(['Title', 'First'])
  })

  it('should pass parent and depth', () => {
    const doc = parse(SOURCE)
    const depths: Array<[string, number]> = []
    doc.visit({
      taskItem: (node, context) => {
        depths.push([node.id ?? '?', context.depth])
        expect(context.parent).not.toBeNull()
      },
    })
    expect(depths).toEqual([
      ['1', 2],
      ['1.1', 4],
      ['2', 2],
    ])
  })

  it('should call leave after the subtree', () => {
    const doc = parse('- a\n')
    const events: string[] = []
    doc.visit({
      enter: (node) => {
        if (node.type !== 'marker' && node.type !== 'text') events.push(`+${node.type}`)
      },
      leave: (node) => {
        if (node.type !== 'marker' && node.type !== 'text') events.push(`-${node.type}`)
      },
    })
    expect(events).toEqual(['+document', '+list', '+listItem', '-listItem', '-list', '-document'])
  })
})

describe('LineIndex', () => {
  const index = new LineIndex('ab\ncd\r\nef')

  it('should map offsets to 1-based positions', () => {
    expect(index.lineCount).toBe(3)
    expect(index.offsetToPosition(0)).toEqual({ line: 1, column: 1 })
    expect(index.offsetToPosition(4)).toEqual({ line: 2, column: 2 })
    expect(index.offsetToPosition(7)).toEqual({ line: 3, column: 1 })
  })

  it('should map positions back to offsets', () => {
    expect(index.positionToOffset({ line: 3, column: 1 })).toBe(7)
    expect(index.positionToOffset({ line: 1, column: 99 })).toBe(2)
  })

  it('should return line ranges without line endings', () => {
    expect(index.lineRange(1)).toEqual({ start: 0, end: 2 })
    expect(index.lineRange(2)).toEqual({ start: 3, end: 5 })
    expect(index.lineRange(3)).toEqual({ start: 7, end: 9 })
  })

  it('should give node lines through the document', () => {
    const doc = parse(SOURCE)
    const second = doc.query('h2[text=Second]').first()
    expect(second && doc.line(second.id)).toBe(7)
  })
})

describe('matchTaskLine', () => {
  it('should tolerate any spacing between the parts', () => {
    const expected = { id: '1.2', checked: false, description: 'Task' }
    expect(matchTaskLine('- [ ]  1.2  Task')).toEqual(expected)
    expect(matchTaskLine('- [ ] 1.2 Task')).toEqual(expected)
    expect(matchTaskLine('-[ ]1.2\tTask')).toEqual(expected)
    expect(matchTaskLine('  - [ ] 1.2. Task  ')).toEqual(expected)
  })

  it('should read the checked state', () => {
    expect(matchTaskLine('- [x] Done')).toEqual({ id: null, checked: true, description: 'Done' })
    expect(matchTaskLine('- [X] 3 Done')).toEqual({ id: '3', checked: true, description: 'Done' })
  })

  it('should reject lines that are not tasks', () => {
    expect(matchTaskLine('- plain item')).toBeNull()
    expect(matchTaskLine('* [ ] star bullet')).toBeNull()
    expect(matchTaskLine('text [ ] 1')).toBeNull()
    expect(matchTaskLine('')).toBeNull()
  })

  it('should allow an empty description', () => {
    expect(matchTaskLine('- [ ] 4.1')).toEqual({ id: '4.1', checked: false, description: '' })
  })
})
