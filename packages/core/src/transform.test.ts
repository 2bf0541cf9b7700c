import { describe, expect, it } from 'vitest'
import { extractRequirements } from './extractor.js'
import { parse } from './markdown/parser.js'
import { sameStructure } from './markdown/structure.js'
import { addScenario, applyReplacements, pipeline, removeRequirement, renameRequirement, when } from './transform.js'

const SPEC = `# Auth

## Requirements

### Requirement: Login
The system SHALL log users in.

#### Scenario: Valid
- WHEN credentials are valid

### Requirement: Logout
The system SHALL log users out.

## Notes
Keep it short.
`

describe('requirement transforms', () => {
  it('should rename a requirement by name, ignoring case', () => {
    const result = renameRequirement('login', 'Sign in')(parse(SPEC))

    expect(result.source).toBe(SPEC.replace('### Requirement: Login', '### Requirement: Sign in'))
    expect(sameStructure(result, parse(result.source))).toBe(true)
  })

  it('should return the same document when nothing matches', () => {
    const doc = parse(SPEC)
    expect(renameRequirement('Missing', 'Other')(doc)).toBe(doc)
    expect(removeRequirement('Missing')(doc)).toBe(doc)
    expect(addScenario('Missing', { name: 'A', body: '' })(doc)).toBe(doc)
  })

  it('should remove a requirement with the blank lines after it', () => {
    const removedLogin = removeRequirement('Login')(parse(SPEC))
    expect(removedLogin.source).toBe(
      SPEC.replace('### Requirement: Login\nThe system SHALL log users in.\n\n#### Scenario: Valid\n- WHEN credentials are valid\n\n', '')
    )

    const removedLogout = removeRequirement('Logout')(parse(SPEC))
    expect(removedLogout.source).toBe(SPEC.replace('### Requirement: Logout\nThe system SHALL log users out.\n\n', ''))
    expect(sameStructure(removedLogout, parse(removedLogout.source))).toBe(true)
  })

  it('should append a scenario after the last block of a requirement', () => {
    const result = addScenario('Logout', {
      name: 'Timeout',
      body: '- WHEN the session expires\n- THEN the user is logged out\n',
    })(parse(SPEC))

    expect(result.source).toBe(
      SPEC.replace(
        'The system SHALL log users out.\n',
        'The system SHALL log users out.\n\n#### Scenario: Timeout\n- WHEN the session expires\n- THEN the user is logged out\n'
      )
    )
    expect(extractRequirements(result).map((r) => [r.name, r.scenarios])).toEqual([
      ['Login', ['Valid']],
      ['Logout', ['Timeout']],
    ])
  })

  it('should add a line break before a scenario at the end of an unterminated file', () => {
    const source = '### Requirement: A\nThe system SHALL a.'
    expect(addScenario('A', { name: 'S', body: '- WHEN s' })(parse(source)).source).toBe(
      `${source}\n\n#### Scenario: S\n- WHEN s\n`
    )
  })

  it('should run a pipeline in order', () => {
    const transform = pipeline(
      renameRequirement('Login', 'Sign in'),
      addScenario('Sign in', { name: 'Locked', body: '- WHEN the account is locked' }),
      removeRequirement('Logout')
    )

    expect(transform(parse(SPEC)).source).toBe(`# Auth

## Requirements

### Requirement: Sign in
The system SHALL log users in.

#### Scenario: Valid
- WHEN credentials are valid

#### Scenario: Locked
- WHEN the account is locked

## Notes
Keep it short.
`)
  })

  it('should apply a conditional transform only when the predicate holds', () => {
    const doc = parse(SPEC)
    const removeWhenMany = when((d) => extractRequirements(d).length > 2, removeRequirement('Logout'))

    expect(removeWhenMany(doc)).toBe(doc)
    expect(when(() => true, removeRequirement('Logout'))(doc).source).toBe(
      SPEC.replace('### Requirement: Logout\nThe system SHALL log users out.\n\n', '')
    )
  })

  it('should apply replacements from the end of the document', () => {
    const doc = parse('abc def\n')
    const result = applyReplacements(doc, [
      { start: 0, end: 3, text: 'x' },
      { start: 4, end: 7, text: 'yz' },
    ])
    expect(result.source).toBe('x yz\n')
  })
})
