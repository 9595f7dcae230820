import { describe, expect, it } from 'vitest'

import { parseStatus } from '../../core/git/parse-status'

describe('parseStatus', () => {
  it('returns empty lists for a clean tree', () => {
    expect(parseStatus('')).toEqual({ unstaged: [], staged: [] })
  })

  it('separates staged and unstaged changes', () => {
    let output = [
      'M  src/staged.py',
      ' M src/unstaged.py',
      'MM src/both.py',
      'A  src/added.py',
      ' D src/deleted.py',
      '',
    ].join('\n')

    expect(parseStatus(output)).toEqual({
      staged: ['src/staged.py', 'src/both.py', 'src/added.py'],
      unstaged: ['src/unstaged.py', 'src/both.py', 'src/deleted.py'],
    })
  })

  it('keeps the destination of renames', () => {
    expect(parseStatus('R  old.py -> new.py\n')).toEqual({
      staged: ['new.py'],
      unstaged: [],
    })
  })

  it('skips untracked and ignored entries', () => {
    expect(parseStatus('?? notes.txt\r\n!! build/\r\n')).toEqual({
      unstaged: [],
      staged: [],
    })
  })
})
