import { formatDecimal, formatTimestamp, renderPanel, renderTable } from './layout';

describe('layout', () => {
  describe('renderPanel', () => {
    it('should box the lines under the title', () => {
      expect(renderPanel('T', ['ab']).split('\n')).toEqual(['╭─ T ─╮', '│ ab  │', '╰─────╯']);
    });

    it('should widen to the longest line', () => {
      expect(renderPanel('T', ['a', 'abcdef']).split('\n')).toEqual([
        '╭── T ───╮',
        '│ a      │',
        '│ abcdef │',
        '╰────────╯',
      ]);
    });
  });

  describe('renderTable', () => {
    it('should size columns to their widest cell', () => {
      expect(renderTable(undefined, ['A', 'Bb'], [['x', 'yyy']]).split('\n')).toEqual([
        '┌───┬─────┐',
        '│ A │ Bb  │',
        '├───┼─────┤',
        '│ x │ yyy │',
        '└───┴─────┘',
      ]);
    });

    it('should centre the title over the table', () => {
      expect(renderTable('Hi', ['A', 'Bb'], [['x', 'yyy']]).split('\n')[0]).toBe('    Hi');
    });

    it('should render styled cells by their text', () => {
      const table = renderTable(undefined, ['Side'], [[{ text: 'SELL', style: (s) => s }]]);

      expect(table.split('\n')[3]).toBe('│ SELL │');
    });
  });

  describe('formatDecimal', () => {
    it.each([
      [0.01, 8, '0.01'],
      [12, 4, '12'],
      [0, 8, '0'],
      [64998.7, 4, '64998.7'],
      [1.23456789, 4, '1.2346'],
    ])('should format %p with up to %p decimals as %p', (value, decimals, expected) => {
      expect(formatDecimal(value, decimals)).toBe(expected);
    });
  });

  describe('formatTimestamp', () => {
    it('should print local date and time', () => {
      expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02 03:04:05');
    });
  });
});
