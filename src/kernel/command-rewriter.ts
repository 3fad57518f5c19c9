import type { CommandRule, OperandName, OperandSpec } from './command-rules.js';
import { COMMAND_RULES } from './command-rules.js';
import { isCoordinateValid } from './coordinate-validator.js';
import type { Coordinate } from './grid.js';
import { cellOf, formatCell, formatCoordinate, formatFixed, translateCell, translateCoordinate } from './grid.js';
import { conversionError } from './runtime-error.js';
import type { TranslationContext } from './translation-context.js';

export type CommandTextOwner = 'Script' | 'DialogueInfo';

export interface CommandTextSource {
  readonly owner: CommandTextOwner;
  /** Diagnostic path of the text field, e.g. `records[12].text`. */
  readonly path: string;
  readonly recordId?: string;
}

export interface CommandRewriteResult {
  readonly text: string;
  readonly rewrittenCount: number;
}

interface EmbeddedCommand {
  readonly rule: CommandRule;
  readonly matchedText: string;
  readonly keywordToken: string;
  readonly operands: ReadonlyMap<OperandName, string>;
  readonly position: Coordinate;
  readonly z: number;
  readonly rotation?: number;
}

/**
 * Applies every command rule, in table order, to one script text. Text outside
 * the recognised commands and commands outside the region are kept as-is.
 */
export function rewriteCommandText(
  text: string,
  context: TranslationContext,
  source: CommandTextSource,
): CommandRewriteResult {
  let current = text;
  let rewrittenCount = 0;

  for (const rule of COMMAND_RULES) {
    const result = applyCommandRule(current, rule, context, source);
    current = result.text;
    rewrittenCount += result.rewrittenCount;
  }

  return { text: current, rewrittenCount };
}

export function applyCommandRule(
  text: string,
  rule: CommandRule,
  context: TranslationContext,
  source: CommandTextSource,
): CommandRewriteResult {
  let output = '';
  let cursor = 0;
  let rewrittenCount = 0;

  for (const match of text.matchAll(rule.pattern)) {
    const start = match.index ?? 0;
    const command = readEmbeddedCommand(rule, match, source);
    output += text.slice(cursor, start);
    cursor = start + command.matchedText.length;

    const cell = cellOf(command.position);
    if (!isCoordinateValid(cell, context)) {
      context.diagnostics.report({
        code: 'COMMAND_OUTSIDE_REGION',
        path: source.path,
        severity: 'info',
        message: `Skipped: ${source.owner} '${rule.label}' at grid ${formatCell(cell)} is outside the region.`,
        ...(source.recordId === undefined ? {} : { entityId: source.recordId }),
      });
      output += command.matchedText;
      continue;
    }

    const translated = translateCoordinate(command.position, cell, context.offset);
    context.diagnostics.report({
      code: 'COMMAND_TRANSLATED',
      path: source.path,
      severity: 'info',
      message:
        `Found: ${source.owner} '${rule.label}' translation -> grid ${formatCell(cell)} | coordinates ${formatCoordinate(command.position)}; ` +
        `new grid ${formatCell(translateCell(cell, context.offset))} | coordinates ${formatCoordinate(translated)}.`,
      ...(source.recordId === undefined ? {} : { entityId: source.recordId }),
    });

    output += formatCommand(command, translated);
    rewrittenCount += 1;
  }

  output += text.slice(cursor);
  return { text: output, rewrittenCount };
}

function readEmbeddedCommand(rule: CommandRule, match: RegExpMatchArray, source: CommandTextSource): EmbeddedCommand {
  const groups: Readonly<Record<string, string | undefined>> = match.groups ?? {};
  const operands = new Map<OperandName, string>();
  for (const operand of rule.operands) {
    const value = groups[operand.name];
    if (value !== undefined) {
      operands.set(operand.name, value);
    }
  }

  const rotation = operands.get('rotation');
  return {
    rule,
    matchedText: match[0],
    keywordToken: groups.keyword ?? rule.keyword,
    operands,
    position: {
      x: parseNumericOperand(rule, 'x', operands.get('x'), source),
      y: parseNumericOperand(rule, 'y', operands.get('y'), source),
    },
    z: parseNumericOperand(rule, 'z', operands.get('z'), source),
    ...(rotation === undefined ? {} : { rotation: parseNumericOperand(rule, 'rotation', rotation, source) }),
  };
}

function parseNumericOperand(
  rule: CommandRule,
  operand: OperandName,
  raw: string | undefined,
  source: CommandTextSource,
): number {
  const value = raw === undefined ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw conversionError(
      'COMMAND_OPERAND_INVALID',
      `${source.owner} command ${rule.keyword} has a non-numeric ${operand} operand at ${source.path}.`,
      {
        command: rule.keyword,
        operand,
        value: raw ?? '',
        ...(source.recordId === undefined ? {} : { recordId: source.recordId }),
      },
    );
  }
  return value;
}

function formatCommand(command: EmbeddedCommand, translated: Coordinate): string {
  const parts = [command.keywordToken];
  for (const operand of command.rule.operands) {
    const raw = command.operands.get(operand.name);
    if (raw === undefined) {
      continue;
    }
    parts.push(formatOperand(command, operand, raw, translated));
  }
  return parts.join(', ');
}

function formatOperand(command: EmbeddedCommand, operand: OperandSpec, raw: string, translated: Coordinate): string {
  switch (operand.kind) {
    case 'x':
      return formatFixed(translated.x, 3);
    case 'y':
      return formatFixed(translated.y, 3);
    case 'z':
      return formatFixed(command.z, 3);
    case 'rotation':
      return formatFixed(command.rotation ?? Number(raw), 0);
    case 'identifier':
    case 'count':
      return raw;
  }
}
