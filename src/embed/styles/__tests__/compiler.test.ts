import { describe, it, expect } from 'vitest';
import { compileStylesheet, findUnresolvedVariables, joinSelectors } from '../compiler';
import { StylesheetCompileError } from '../../../utils/errors';

describe('joinSelectors', () => {
  it('nests with a descendant combinator', () => {
    expect(joinSelectors('.a', '.b')).toBe('.a .b');
  });

  it('replaces & with the parent', () => {
    expect(joinSelectors('.a', '&:hover')).toBe('.a:hover');
    expect(joinSelectors('.a', '&.-is-active .b')).toBe('.a.-is-active .b');
  });

  it('expands selector lists on both sides', () => {
    expect(joinSelectors('.a, .b', '.c, &.d')).toBe('.a .c, .a.d, .b .c, .b.d');
  });

  it('keeps commas inside functional pseudo-classes, attributes and strings', () => {
    expect(joinSelectors('.x', ':not(.a, .b)')).toBe('.x :not(.a, .b)');
    expect(joinSelectors('.x, .y', '&:is(.a, .b), .c')).toBe('.x:is(.a, .b), .x .c, .y:is(.a, .b), .y .c');
    expect(joinSelectors('.x', '[data-k="a,b"], .c')).toBe('.x [data-k="a,b"], .x .c');
    expect(joinSelectors(':where(.a, .b)', '.c')).toBe(':where(.a, .b) .c');
  });

  it('rejects & at the top level and empty selectors', () => {
    expect(() => joinSelectors(undefined, '&.x')).toThrow(StylesheetCompileError);
    expect(() => joinSelectors('.a', ' , ')).toThrow('Empty selector');
  });
});

describe('compileStylesheet', () => {
  it('flattens nested rules and substitutes variables', () => {
    const { css } = compileStylesheet(
      [
        {
          selector: '.a',
          declarations: { color: '@c', margin: 0 },
          rules: [
            { selector: '&:hover', declarations: { color: '@d' } },
            { selector: '.b', rules: [{ selector: '.c', declarations: { padding: '@p @p' } }] },
          ],
        },
      ],
      { tokens: { c: 'red', d: 'blue', p: '4px' } },
    );
    expect(css).toBe('.a{color:red;margin:0}\n.a:hover{color:blue}\n.a .b .c{padding:4px 4px}\n');
  });

  it('groups rules under their media query', () => {
    const { css } = compileStylesheet(
      [
        { selector: '.a', declarations: { x: '1' } },
        {
          selector: '.a',
          media: '(max-width:@bp)',
          declarations: { x: '2' },
          rules: [{ selector: '.b', declarations: { y: '3' } }],
        },
        { selector: '.z', declarations: { x: '4' } },
      ],
      { tokens: { bp: '600px' } },
    );
    expect(css).toBe('.a{x:1}\n@media (max-width:600px){\n  .a{x:2}\n  .a .b{y:3}\n}\n.z{x:4}\n');
  });

  it('combines nested media queries', () => {
    const { rules } = compileStylesheet(
      [{ selector: '.a', media: 'screen', rules: [{ selector: '.b', media: '(min-width:1px)', declarations: { x: '1' } }] }],
      { tokens: {} },
    );
    expect(rules).toEqual([{ selector: '.a .b', declarations: [['x', '1']], media: 'screen and (min-width:1px)' }]);
  });

  it('fails on unresolved variables, naming the selector', () => {
    try {
      compileStylesheet([{ selector: '.a', declarations: { color: '@nope' } }], { tokens: {} });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(StylesheetCompileError);
      if (err instanceof StylesheetCompileError) {
        expect(err.message).toBe('Unresolved variable @nope in .a');
        expect(err.variable).toBe('nope');
        expect(err.selector).toBe('.a');
      }
    }
  });

  it('emits the preamble first', () => {
    const { css } = compileStylesheet([{ selector: '.a', declarations: { x: '1' } }], {
      tokens: {},
      preamble: '  @import url(base.css);  ',
    });
    expect(css).toBe('@import url(base.css);\n.a{x:1}\n');
  });
});

describe('findUnresolvedVariables', () => {
  it('ignores at-rule keywords', () => {
    expect(findUnresolvedVariables('@import url(a.css);\n@media (x){\n  .a{b:c}\n}')).toEqual([]);
  });

  it('ignores @ inside strings and url()', () => {
    expect(findUnresolvedVariables('.a{background:url(icon@2x.png)}\n.b{content:"@"}\n.c{content:\'@home\'}')).toEqual([]);
    expect(findUnresolvedVariables('.a{background:url("img@dark.png");color:@accent}')).toEqual(['accent']);
  });

  it('reports references inside declarations', () => {
    expect(findUnresolvedVariables('@media (x){\n  .a{color:@c;margin:@m}\n}')).toEqual(['c', 'm']);
  });
});
