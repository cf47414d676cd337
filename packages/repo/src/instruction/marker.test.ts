import { findInstructionMarker, canonicalizeMarkers } from './marker';

describe('findInstructionMarker', () => {
  it('detects the legacy form and left-trims the line', () => {
    const text = 'struct A {\n    // TODO: - Add a name property\n}';
    expect(findInstructionMarker(text)).toEqual({
      kind: 'legacy',
      rawLine: '// TODO: - Add a name property',
      line: 2,
    });
  });

  it('detects the ChatGPT form', () => {
    expect(findInstructionMarker('\t// TODO: ChatGPT: Explain this')).toEqual({
      kind: 'chatgpt',
      rawLine: '// TODO: ChatGPT: Explain this',
      line: 1,
    });
  });

  it('returns the first of several markers', () => {
    const text = '// TODO: ChatGPT: first\n// TODO: - second';
    expect(findInstructionMarker(text)?.rawLine).toBe('// TODO: ChatGPT: first');
  });

  it('ignores plain TODO comments', () => {
    expect(findInstructionMarker('// TODO: refactor\n// TODO:- tight')).toBeUndefined();
  });

  it('strips carriage returns from CRLF files', () => {
    expect(findInstructionMarker('let a = 1\r\n// TODO: - Fix\r\n')?.rawLine).toBe('// TODO: - Fix');
  });
});

describe('canonicalizeMarkers', () => {
  it('rewrites every legacy marker', () => {
    expect(canonicalizeMarkers('// TODO: - Do something\n  // TODO: - Again')).toBe(
      '// TODO: ChatGPT: Do something\n  // TODO: ChatGPT: Again',
    );
  });

  it('leaves canonical markers alone', () => {
    expect(canonicalizeMarkers('// TODO: ChatGPT: ok')).toBe('// TODO: ChatGPT: ok');
  });
});
