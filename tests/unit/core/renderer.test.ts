import { labeledItem, renderGuide } from '../../../src/core/renderer.js';
import { toGuideValue } from '../../../src/schemas/guide.js';

const complete = {
  overview: 'X is great.',
  attractions: '1. Tower',
  transportation: 'Metro',
  food_and_dining: 'Cafes',
  tips: 'Be safe',
};

describe('renderGuide', () => {
  it('renders string values under fixed headers in order', () => {
    expect(renderGuide(complete, 'X')).toBe(
      [
        '# Travel Guide: X',
        '## Overview',
        'X is great.',
        '## Must-See Attractions',
        '1. Tower',
        '## Getting Around',
        'Metro',
        '## Food & Dining',
        'Cafes',
        '## Practical Tips',
        'Be safe',
      ].join('\n\n') + '\n',
    );
  });

  it('follows the fixed order whatever the key order of the input', () => {
    const doc = renderGuide({ tips: 'T', overview: 'O', food_and_dining: 'F' }, 'Y');
    expect(doc).toBe('# Travel Guide: Y\n\n## Overview\n\nO\n\n## Food & Dining\n\nF\n\n## Practical Tips\n\nT\n');
  });

  it('omits sections for missing keys', () => {
    const { overview, attractions, transportation, food_and_dining } = complete;
    const doc = renderGuide({ overview, attractions, transportation, food_and_dining }, 'X');
    expect(doc).not.toContain('Practical Tips');
    expect(doc.endsWith('## Food & Dining\n\nCafes\n')).toBe(true);
  });

  it('renders name/description items as labeled blocks', () => {
    const doc = renderGuide({ attractions: [{ name: 'Tower', description: 'Tall' }] }, 'X');
    expect(doc).toBe('# Travel Guide: X\n\n## Must-See Attractions\n\n### Tower\n\nTall\n');
  });

  it('falls back to raw JSON bullets for items without name/description', () => {
    const doc = renderGuide({ transportation: [{ mode: 'Bus', details: 'Cheap' }] }, 'X');
    expect(doc).toBe('# Travel Guide: X\n\n## Getting Around\n\n- {"mode":"Bus","details":"Cheap"}\n');
  });

  it('groups consecutive bullets and interleaves labeled blocks', () => {
    const doc = renderGuide(
      { attractions: ['Museum', 'Harbour', { title: 'Tower', description: 'Tall' }, 'Park'] },
      'X',
    );
    expect(doc).toBe(
      '# Travel Guide: X\n\n## Must-See Attractions\n\n- Museum\n- Harbour\n\n### Tower\n\nTall\n\n- Park\n',
    );
  });

  it('renders mappings as one sub-block per key', () => {
    const doc = renderGuide(
      { transportation: { Metro: 'Fast', Bus: ['Line 1', 'Line 2'], Taxi: { fare: 'High' } } },
      'X',
    );
    expect(doc).toBe(
      [
        '# Travel Guide: X',
        '## Getting Around',
        '### Metro',
        'Fast',
        '### Bus',
        '- Line 1\n- Line 2',
        '### Taxi',
        '{"fare":"High"}',
      ].join('\n\n') + '\n',
    );
  });

  it('renders scalars verbatim', () => {
    expect(renderGuide({ tips: 42 }, 'X')).toBe('# Travel Guide: X\n\n## Practical Tips\n\n42\n');
    expect(renderGuide({ tips: false }, 'X')).toBe('# Travel Guide: X\n\n## Practical Tips\n\nfalse\n');
  });

  it('keeps the header of an empty section', () => {
    expect(renderGuide({ overview: '' }, 'X')).toBe('# Travel Guide: X\n\n## Overview\n');
  });

  it('never throws on any JSON shape', () => {
    const shapes: unknown[] = [
      'text',
      0,
      null,
      true,
      [],
      {},
      [[['deep']]],
      [{ name: { first: 'T' }, description: 'd' }],
      { a: { b: { c: [1, { d: null }] } } },
      [{ name: 'Only a name' }],
      [{ description: 'Only a description' }],
    ];
    for (const value of shapes) {
      expect(() =>
        renderGuide(
          { overview: value, attractions: value, transportation: value, food_and_dining: value, tips: value },
          'X',
        ),
      ).not.toThrow();
    }
  });
});

describe('labeledItem', () => {
  it('prefers name over title', () => {
    expect(labeledItem(toGuideValue({ title: 'B', name: 'A', description: 'd' }))).toEqual({
      label: 'A',
      body: { kind: 'text', text: 'd' },
    });
  });

  it('rejects items whose label is not text', () => {
    expect(labeledItem(toGuideValue({ name: ['A'], description: 'd' }))).toBeUndefined();
  });

  it('rejects non-mapping values', () => {
    expect(labeledItem(toGuideValue('Tower'))).toBeUndefined();
  });
});
