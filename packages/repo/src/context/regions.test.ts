import { filterRegions } from './regions';

const MARKERS = { start: '// v', end: '// ^', placeholder: '// ...' };

describe('filterRegions', () => {
  it('returns content without markers unchanged', () => {
    expect(filterRegions('struct A {}\n', MARKERS)).toBe('struct A {}\n');
  });

  it('keeps the marked region and drops the rest', () => {
    const content = [
      'import Foundation',
      '// v',
      'func secretFunction() {',
      '  print("kept")',
      '}',
      '// ^',
      'func publicFunction() {',
      '  print("dropped")',
      '}',
    ].join('\n');

    expect(filterRegions(content, MARKERS)).toBe(
      ['// ...', 'func secretFunction() {', '  print("kept")', '}', '// ...'].join('\n'),
    );
  });

  it('repeats placeholder-then-region for every pair in order', () => {
    const content = ['a', '  // v', 'b', '  // ^', 'c', '// v', 'd', '// ^', 'e'].join('\n');
    expect(filterRegions(content, MARKERS)).toBe(['// ...', 'b', '// ...', 'd', '// ...'].join('\n'));
  });

  it('extends an unclosed region to the end of the file', () => {
    const content = ['a', '// v', 'b', 'c'].join('\n');
    expect(filterRegions(content, MARKERS)).toBe(['// ...', 'b', 'c'].join('\n'));
  });

  it('treats a repeated start marker inside a region as part of the same region', () => {
    const content = ['// v', 'a', '// v', 'b', '// ^'].join('\n');
    expect(filterRegions(content, MARKERS)).toBe(['// ...', 'a', 'b', '// ...'].join('\n'));
  });

  it('does not treat lines merely containing the token as markers', () => {
    const content = ['// version 2', 'x'].join('\n');
    expect(filterRegions(content, MARKERS)).toBe(content);
  });
});
