import type { Document } from './document.js'
import { QuerySyntaxError } from './errors.js'
import { childrenOf, type MarkdownNode, type NodeId } from './nodes.js'

/**
 * Selector queries over a document.
 *
 * ```
 * h2[text^="ADDED"] h3[text^="Requirement:"]
 * list > task[checked=false]
 * wikilink[target="auth"], code[lang=ts]
 * ```
 *
 * Ancestry follows the tree and then the header outline: a block sits under
 * the headers whose sections contain it, innermost first, and a header sits
 * under the enclosing headers of lower level.
 */

export interface NodeHandle {
  id: NodeId
  node: MarkdownNode
}

const KINDS = [
  '*',
  'document',
  'header',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'paragraph',
  'code',
  'list',
  'item',
  'task',
  'text',
  'wikilink',
  'emphasis',
  'strong',
  'inlinecode',
  'blank',
  'marker',
] as const

export type SelectorKind = (typeof KINDS)[number]

const ATTRIBUTES = ['text', 'level', 'checked', 'id', 'lang', 'target', 'ordered'] as const

export type SelectorAttribute = (typeof ATTRIBUTES)[number]

type Operator = 'exists' | '=' | '^=' | '$=' | '*=' | '<' | '<=' | '>' | '>='

const OPERATORS: readonly Exclude<Operator, 'exists'>[] = ['^=', '$=', '*=', '<=', '>=', '=', '<', '>']

interface AttributeTest {
  name: SelectorAttribute
  op: Operator
  value: string
  ignoreCase: boolean
}

interface Compound {
  kind: SelectorKind
  tests: AttributeTest[]
}

type Combinator = 'descendant' | 'child'

interface ComplexSelector {
  compounds: Compound[]
  /** `combinators[i]` joins `compounds[i]` and `compounds[i + 1]` */
  combinators: Combinator[]
}

function isKind(value: string): value is SelectorKind {
  return KINDS.some((kind) => kind === value)
}

function isAttribute(value: string): value is SelectorAttribute {
  return ATTRIBUTES.some((name) => name === value)
}

function isNumericOperator(op: Operator): boolean {
  return op === '<' || op === '<=' || op === '>' || op === '>='
}

class SelectorParser {
  private pos = 0

  constructor(private readonly selector: string) {}

  parse(): ComplexSelector[] {
    const list: ComplexSelector[] = []
    this.skipSpace()
    if (this.done) this.fail('empty selector')
    for (;;) {
      list.push(this.complex())
      this.skipSpace()
      if (this.done) break
      if (this.peek !== ',') this.fail(`unexpected "${this.peek}"`)
      this.pos++
      this.skipSpace()
      if (this.done) this.fail('expected a selector after ","')
    }
    return list
  }

  private get done(): boolean {
    return this.pos >= this.selector.length
  }

  private get peek(): string {
    return this.selector[this.pos] ?? ''
  }

  private fail(reason: string, at = this.pos): never {
    throw new QuerySyntaxError(this.selector, at, reason)
  }

  private skipSpace(): boolean {
    const from = this.pos
    while (!this.done && /\s/.test(this.peek)) this.pos++
    return this.pos > from
  }

  private complex(): ComplexSelector {
    const compounds = [this.compound()]
    const combinators: Combinator[] = []
    for (;;) {
      const spaced = this.skipSpace()
      if (this.done || this.peek === ',') break
      if (this.peek === '>') {
        this.pos++
        this.skipSpace()
        combinators.push('child')
      } else if (spaced) {
        combinators.push('descendant')
      } else {
        this.fail(`unexpected "${this.peek}"`)
      }
      compounds.push(this.compound())
    }
    return { compounds, combinators }
  }

  private identifier(): string {
    const from = this.pos
    while (!this.done && /[A-Za-z0-9_-]/.test(this.peek)) this.pos++
    return this.selector.slice(from, this.pos)
  }

  private compound(): Compound {
    const at = this.pos
    let kind: SelectorKind = '*'
    if (this.peek === '*') {
      this.pos++
    } else if (this.peek !== '[') {
      const name = this.identifier().toLowerCase()
      if (!name) this.fail('expected a node kind', at)
      if (!isKind(name)) this.fail(`unknown node kind "${name}"`, at)
      kind = name
    }
    const tests: AttributeTest[] = []
    while (this.peek === '[') {
      tests.push(this.attribute())
    }
    return { kind, tests }
  }

  private attribute(): AttributeTest {
    this.pos++
    this.skipSpace()
    const at = this.pos
    const name = this.identifier().toLowerCase()
    if (!name) this.fail('expected an attribute name', at)
    if (!isAttribute(name)) this.fail(`unknown attribute "${name}"`, at)
    this.skipSpace()
    if (this.peek === ']') {
      this.pos++
      return { name, op: 'exists', value: '', ignoreCase: false }
    }

    const opAt = this.pos
    const op = OPERATORS.find((candidate) => this.selector.startsWith(candidate, this.pos))
    if (!op) this.fail('expected an operator or "]"', opAt)
    this.pos += op.length
    this.skipSpace()

    const valueAt = this.pos
    const value = this.value()
    if (isNumericOperator(op) && Number.isNaN(Number(value))) {
      this.fail(`expected a number after "${op}"`, valueAt)
    }

    this.skipSpace()
    let ignoreCase = false
    if (this.peek === 'i' || this.peek === 'I') {
      this.pos++
      ignoreCase = true
      this.skipSpace()
    }
    if (this.peek !== ']') this.fail('expected "]"')
    this.pos++
    return { name, op, value, ignoreCase }
  }

  private value(): string {
    const quote = this.peek
    if (quote === '"' || quote === "'") {
      const at = this.pos
      this.pos++
      let out = ''
      while (!this.done && this.peek !== quote) {
        if (this.peek === '\\' && this.pos + 1 < this.selector.length) this.pos++
        out += this.peek
        this.pos++
      }
      if (this.done) this.fail('unterminated string', at)
      this.pos++
      return out
    }
    const from = this.pos
    while (!this.done && this.peek !== ']' && !/\s/.test(this.peek)) this.pos++
    if (this.pos === from) this.fail('expected a value')
    return this.selector.slice(from, this.pos)
  }
}

export function parseSelector(selector: string): ComplexSelector[] {
  return new SelectorParser(selector).parse()
}

type AttributeValue = string | number | boolean | undefined

function innerText(document: Document, children: readonly NodeId[]): string {
  if (children.length < 2) return ''
  const open = document.node(children[0])
  const close = document.node(children[children.length - 1])
  return document.source.slice(open.end, close.start)
}

export function attributeOf(document: Document, id: NodeId, name: SelectorAttribute): AttributeValue {
  const node = document.node(id)
  switch (name) {
    case 'text':
      switch (node.type) {
        case 'header':
          return node.text
        case 'listItem':
          return node.text
        case 'taskItem':
          return node.description
        case 'text':
          return node.value
        case 'wikiLink':
          return node.display ?? node.target
        case 'inlineCode':
          return node.code
        case 'codeBlock':
          return node.content
        case 'paragraph':
          return document.text(id).trim()
        case 'emphasis':
        case 'strong':
          return innerText(document, node.children)
        default:
          return undefined
      }
    case 'level':
      return node.type === 'header' ? node.level : undefined
    case 'checked':
      return node.type === 'taskItem' ? node.checked : undefined
    case 'id':
      return node.type === 'taskItem' ? (node.id ?? undefined) : undefined
    case 'lang':
      return node.type === 'codeBlock' ? node.lang : undefined
    case 'target':
      return node.type === 'wikiLink' ? node.target : undefined
    case 'ordered':
      return node.type === 'list' ? node.ordered : undefined
  }
}

function testAttribute(document: Document, id: NodeId, test: AttributeTest): boolean {
  const raw = attributeOf(document, id, test.name)
  if (raw === undefined) return false
  if (test.op === 'exists') return true

  if (isNumericOperator(test.op)) {
    const actual = typeof raw === 'number' ? raw : Number(raw)
    const expected = Number(test.value)
    if (typeof raw === 'boolean' || Number.isNaN(actual)) return false
    switch (test.op) {
      case '<':
        return actual < expected
      case '<=':
        return actual <= expected
      case '>':
        return actual > expected
      default:
        return actual >= expected
    }
  }

  const actual = test.ignoreCase ? String(raw).toLowerCase() : String(raw)
  const expected = test.ignoreCase ? test.value.toLowerCase() : test.value
  switch (test.op) {
    case '=':
      return actual === expected
    case '^=':
      return actual.startsWith(expected)
    case '$=':
      return actual.endsWith(expected)
    default:
      return actual.includes(expected)
  }
}

function testKind(node: MarkdownNode, kind: SelectorKind): boolean {
  switch (kind) {
    case '*':
      return true
    case 'document':
    case 'header':
    case 'paragraph':
    case 'list':
    case 'text':
    case 'emphasis':
    case 'strong':
    case 'marker':
      return node.type === kind
    case 'h1':
    case 'h2':
    case 'h3':
    case 'h4':
    case 'h5':
    case 'h6':
      return node.type === 'header' && `h${node.level}` === kind
    case 'code':
      return node.type === 'codeBlock'
    case 'item':
      return node.type === 'listItem' || node.type === 'taskItem'
    case 'task':
      return node.type === 'taskItem'
    case 'wikilink':
      return node.type === 'wikiLink'
    case 'inlinecode':
      return node.type === 'inlineCode'
    case 'blank':
      return node.type === 'blankLine'
  }
}

function testCompound(document: Document, id: NodeId, compound: Compound): boolean {
  if (!testKind(document.node(id), compound.kind)) return false
  return compound.tests.every((test) => testAttribute(document, id, test))
}

function matchesComplex(document: Document, id: NodeId, selector: ComplexSelector, chain: () => NodeId[]): boolean {
  const { compounds, combinators } = selector
  const last = compounds.length - 1
  if (!testCompound(document, id, compounds[last])) return false
  if (last === 0) return true

  const ancestors = chain()
  const match = (index: number, from: number): boolean => {
    if (index < 0) return true
    const compound = compounds[index]
    if (combinators[index] === 'child') {
      return from < ancestors.length && testCompound(document, ancestors[from], compound) && match(index - 1, from + 1)
    }
    for (let at = from; at < ancestors.length; at++) {
      if (testCompound(document, ancestors[at], compound) && match(index - 1, at + 1)) return true
    }
    return false
  }
  return match(last - 1, 0)
}

/** Lazy, restartable result of a query, in document order. */
export class QueryResult implements Iterable<NodeHandle> {
  constructor(
    private readonly document: Document,
    private readonly selectors: readonly ComplexSelector[]
  ) {}

  *[Symbol.iterator](): Iterator<NodeHandle> {
    const { document, selectors } = this
    const needsAncestry = selectors.some((selector) => selector.compounds.length > 1)
    const ancestry = needsAncestry ? document.ancestry : null
    const stack = [document.root]
    while (stack.length > 0) {
      const id = stack.pop()
      if (id === undefined) break
      const node = document.node(id)
      let chain: NodeId[] | null = null
      const lazyChain = () => (chain ??= ancestry ? ancestry.chain(id) : [])
      if (selectors.some((selector) => matchesComplex(document, id, selector, lazyChain))) {
        yield { id, node }
      }
      const children = childrenOf(node)
      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i])
    }
  }

  first(): NodeHandle | undefined {
    for (const handle of this) return handle
    return undefined
  }

  toArray(): NodeHandle[] {
    return [...this]
  }

  count(): number {
    let n = 0
    for (const _ of this) n++
    return n
  }
}

export function query(document: Document, selector: string): QueryResult {
  return new QueryResult(document, parseSelector(selector))
}

export function find(document: Document, selector: string): NodeHandle[] {
  return query(document, selector).toArray()
}

export function findFirst(document: Document, selector: string): NodeHandle | undefined {
  return query(document, selector).first()
}

export function count(document: Document, selector: string): number {
  return query(document, selector).count()
}

export function exists(document: Document, selector: string): boolean {
  return query(document, selector).first() !== undefined
}
