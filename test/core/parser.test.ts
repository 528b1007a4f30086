/**
 * Tests for the board text format.
 */

import { describe, it, expect } from 'vitest';
import { parseBoard, exportBoard } from '../../src/lib/parser/parser.js';
import { Ice, Rotator, createBoard, isFinish, isIce, isWall } from '../../src/lib/core/types.js';
import { Position } from '../../src/lib/core/position.js';
import { InvalidArgumentError, InvalidBoardError } from '../../src/lib/core/errors.js';

describe('TestParseBoard', () => {
  it('test_parse_simple_board', () => {
    const board = parseBoard('@_F|#~#');

    expect(board.rows).toBe(2);
    expect(board.cols).toBe(3);
    expect(board.tiles[0].map(tile => tile.type)).toEqual(['empty', 'empty', 'finish']);
    expect(isWall(board.tiles[1][0])).toBe(true);
    expect(isIce(board.tiles[1][1])).toBe(true);
    expect(board.agents).toEqual([new Position(0, 0)]);
  });

  it('test_parse_rotators', () => {
    const board = parseBoard('@><');

    expect(board.tiles[0][1]).toEqual(Rotator('cw'));
    expect(board.tiles[0][2]).toEqual(Rotator('ccw'));
  });

  it('test_parse_agent_on_finish', () => {
    const board = parseBoard('_%');

    expect(isFinish(board.tiles[0][1])).toBe(true);
    expect(board.agents).toEqual([new Position(0, 1)]);
  });

  it('test_parse_agents_in_row_major_order', () => {
    const board = parseBoard('_@|@_');

    expect(board.agents).toEqual([new Position(0, 1), new Position(1, 0)]);
  });

  it('test_parse_multiline_with_dots', () => {
    const board = parseBoard(`
      @.F
      #~#
    `);

    expect(board.rows).toBe(2);
    expect(board.cols).toBe(3);
    expect(board.tiles[0][1].type).toBe('empty');
    expect(exportBoard(board)).toBe('@_F|#~#');
  });

  it('test_parse_single_column', () => {
    const board = parseBoard('@|_|F');

    expect(board.rows).toBe(3);
    expect(board.cols).toBe(1);
  });

  it('test_parse_invalid_char_raises_error', () => {
    expect(() => parseBoard('@X')).toThrow(InvalidBoardError);
    expect(() => parseBoard('@X')).toThrow(/Invalid tile character: 'X'/);
    expect(() => parseBoard('@X')).toThrow(/Position: column 1/);
  });

  it('test_parse_inconsistent_row_length_raises_error', () => {
    expect(() => parseBoard('@_|___')).toThrow(/Inconsistent row lengths/);
    expect(() => parseBoard('@_|___')).toThrow(/Row 1: 3 columns - "___"/);
  });

  it('test_parse_without_agent_raises_error', () => {
    expect(() => parseBoard('__F')).toThrow('Board must have at least one agent');
  });

  it('test_parse_empty_definition_raises_error', () => {
    expect(() => parseBoard(' | ')).toThrow(/Board definition is empty/);
  });
});

describe('TestExportBoard', () => {
  it('test_export_round_trip', () => {
    const definition = '%~><#_F|@_____#';
    expect(exportBoard(parseBoard(definition))).toBe(definition);
  });

  it('test_export_rejects_agent_on_ice', () => {
    const board = createBoard([[Ice()]], [new Position(0, 0)]);
    expect(() => exportBoard(board)).toThrow(InvalidArgumentError);
    expect(() => exportBoard(board)).toThrow(
      'Cannot export agent standing on ice at row 0, column 0'
    );
  });

  it('test_export_rejects_shared_cell', () => {
    const board = createBoard([[Ice()]], [new Position(0, 0), new Position(0, 0)]);
    expect(() => exportBoard(board)).toThrow(/two agents on the same cell/);
  });
});
