import { describe, it, expect } from 'vitest'
import {
  classifyLine,
  detectSectionHeader,
  detectStatusInLine,
  extractMeetingDate,
  parseProposalLine,
} from '../line-classifier.js'

describe('extractMeetingDate', () => {
  it('reads the bold-date header', () => {
    expect(extractMeetingDate('**2019-08-20** / @rsc, @bradfitz, @ianlancetaylor')).toBe('2019-08-20')
  })

  it('reads the plain-date header followed by a slash', () => {
    expect(extractMeetingDate('2023-10-04 / **@rsc, @ianlancetaylor**')).toBe('2023-10-04')
  })

  it('rejects a plain date not followed by a slash', () => {
    expect(extractMeetingDate('2023-10-04 **notes**')).toBeNull()
  })

  it('rejects other date separators and bold non-dates', () => {
    expect(extractMeetingDate('2019/08/20 / @rsc')).toBeNull()
    expect(extractMeetingDate('**Accepted**')).toBeNull()
  })

  it('only shape-checks — impossible dates pass through', () => {
    expect(extractMeetingDate('**2019-02-30** / @rsc')).toBe('2019-02-30')
  })
})

describe('detectSectionHeader', () => {
  it('matches every heading case-insensitively', () => {
    expect(detectSectionHeader('**Accepted**')).toBe('accepted')
    expect(detectSectionHeader('**Declined**')).toBe('declined')
    expect(detectSectionHeader('**Likely Accept**')).toBe('likely_accept')
    expect(detectSectionHeader('**Likely Decline** (last call for comments)')).toBe('likely_decline')
    expect(detectSectionHeader('**Active**')).toBe('active')
    expect(detectSectionHeader('**Hold**')).toBe('hold')
    expect(detectSectionHeader('**Discussions**')).toBe('discussions')
    expect(detectSectionHeader('**Discussion**')).toBe('discussions')
  })

  it('ignores indented headings', () => {
    expect(detectSectionHeader('  **Accepted**')).toBeNull()
  })

  it('requires the closing ** right after the keyword', () => {
    expect(detectSectionHeader('**Accepted proposals**')).toBeNull()
  })
})

describe('parseProposalLine', () => {
  it('parses the link-first shape', () => {
    expect(parseProposalLine('- [#25530](https://golang.org/issue/25530) **cmd/go: add GOFLAGS**')).toEqual({
      issueNumber: 25530,
      title: 'cmd/go: add GOFLAGS',
    })
  })

  it('parses the bare-number shape', () => {
    expect(parseProposalLine('- #41184 **net/http: add Server.ShutdownContext**')).toEqual({
      issueNumber: 41184,
      title: 'net/http: add Server.ShutdownContext',
    })
  })

  it('parses the title-first shape', () => {
    expect(
      parseProposalLine('- **x/net/html: add Node.Ancestors** [#62113](https://github.com/golang/go/issues/62113)'),
    ).toEqual({ issueNumber: 62113, title: 'x/net/html: add Node.Ancestors' })
  })

  it('rejects zero and non-numeric issue numbers', () => {
    expect(parseProposalLine('- [#0](https://golang.org/issue/0) **t**')).toBeNull()
    expect(parseProposalLine('- [#12a](https://golang.org/issue/12) **t**')).toBeNull()
    expect(parseProposalLine('- #12a **t**')).toBeNull()
  })

  it('rejects malformed entries', () => {
    expect(parseProposalLine('-[#1](https://golang.org/issue/1) **t**')).toBeNull()
    expect(parseProposalLine('- [#1]() **t**')).toBeNull()
    expect(parseProposalLine('- #123')).toBeNull()
    expect(parseProposalLine('- [#1](https://golang.org/issue/1) ****')).toBeNull()
    expect(parseProposalLine('  - [#1](https://golang.org/issue/1) **t**')).toBeNull()
  })
})

describe('detectStatusInLine', () => {
  it('reads indicators on indented lines', () => {
    expect(detectStatusInLine('  - **accepted** 🎉')).toBe('accepted')
    expect(detectStatusInLine('  - **no final comments; accepted 🎉**')).toBe('accepted')
    expect(detectStatusInLine('  - **likely accept**; last call for comments ⏳')).toBe('likely_accept')
    expect(detectStatusInLine('  - **likely decline; last call for comments')).toBe('likely_decline')
    expect(detectStatusInLine('  - retracted by author; **declined**')).toBe('declined')
    expect(detectStatusInLine('  - **closed**')).toBe('declined')
    expect(detectStatusInLine('  - put on hold for generics')).toBe('hold')
    expect(detectStatusInLine('\t- discussion ongoing')).toBe('discussions')
  })

  it('"on hold" only counts at the end of the line', () => {
    expect(detectStatusInLine('  - on hold')).toBe('hold')
    expect(detectStatusInLine('  - on hold until Go 2')).toBeNull()
  })

  it('ignores top-level lines and plain commentary', () => {
    expect(detectStatusInLine('- **accepted**')).toBeNull()
    expect(detectStatusInLine('  - commented')).toBeNull()
  })
})

describe('classifyLine', () => {
  it('prefers section over proposal over indicator', () => {
    expect(classifyLine('**Accepted**')).toEqual({ kind: 'section', status: 'accepted' })
    expect(classifyLine('- #7 **os: add Foo**')).toEqual({ kind: 'proposal', issueNumber: 7, title: 'os: add Foo' })
    expect(classifyLine('  - **declined**')).toEqual({ kind: 'indicator', status: 'declined' })
    expect(classifyLine('Some prose about the meeting.')).toEqual({ kind: 'prose' })
    expect(classifyLine('')).toEqual({ kind: 'prose' })
  })
})
