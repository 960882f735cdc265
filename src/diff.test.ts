import { describe, it, expect } from 'vitest';

import { MASK, lineDiff, maskSecrets } from './diff.js';

// --- lineDiff ---

describe('lineDiff', () => {
  it('lists every line as added when there is no previous file', () => {
    expect(lineDiff(null, 'a=1\nb=2\n')).toBe('+a=1\n+b=2');
  });

  it('shows only the changed lines', () => {
    expect(lineDiff('host=x\nuser=old\nport=22\n', 'host=x\nuser=new\nport=22\n')).toBe(
      '-user=old\n+user=new',
    );
  });

  it('returns an empty diff for identical text', () => {
    expect(lineDiff('same\n', 'same\n')).toBe('');
  });

  it('reports appended and removed lines', () => {
    expect(lineDiff('a\nb\n', 'a\nb\nc\n')).toBe('+c');
    expect(lineDiff('a\nb\nc\n', 'a\nc\n')).toBe('-b');
  });
});

// --- maskSecrets ---

describe('maskSecrets', () => {
  it('masks every occurrence of each secret', () => {
    expect(maskSecrets('k=abc123 again abc123', ['abc123'])).toBe(
      `k=${MASK} again ${MASK}`,
    );
  });

  it('masks a longer secret whole when it contains a shorter one', () => {
    expect(maskSecrets('a=abc b=abc123', ['abc', 'abc123'])).toBe(`a=${MASK} b=${MASK}`);
  });

  it('ignores empty secrets', () => {
    expect(maskSecrets('plain', [''])).toBe('plain');
  });
});
