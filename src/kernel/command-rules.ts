export const COMMAND_KINDS = [
  'aiEscort',
  'aiEscortCell',
  'aiFollow',
  'aiFollowCell',
  'aiTravel',
  'position',
  'positionCell',
  'placeItem',
  'placeItemCell',
] as const;

export type CommandKind = (typeof COMMAND_KINDS)[number];

/**
 * - `identifier`: actor, object or cell name, quoted or bare; copied verbatim
 * - `count`: unsigned integer (duration, reset flag); copied verbatim
 * - `x` / `y` / `z`: spatial triple; printed with 3 decimals
 * - `rotation`: printed with 0 decimals
 */
export type OperandKind = 'identifier' | 'count' | 'x' | 'y' | 'z' | 'rotation';

export type OperandName = 'actor' | 'object' | 'cell' | 'duration' | 'reset' | 'x' | 'y' | 'z' | 'rotation';

export interface OperandSpec {
  readonly name: OperandName;
  readonly kind: OperandKind;
  readonly optional?: true;
}

export interface CommandRule {
  readonly kind: CommandKind;
  readonly keyword: string;
  readonly label: string;
  readonly operands: readonly OperandSpec[];
  readonly pattern: RegExp;
}

const actor: OperandSpec = { name: 'actor', kind: 'identifier' };
const object: OperandSpec = { name: 'object', kind: 'identifier' };
const cell: OperandSpec = { name: 'cell', kind: 'identifier' };
const duration: OperandSpec = { name: 'duration', kind: 'count' };
const reset: OperandSpec = { name: 'reset', kind: 'count', optional: true };
const rotation: OperandSpec = { name: 'rotation', kind: 'rotation' };
const triple: readonly OperandSpec[] = [
  { name: 'x', kind: 'x' },
  { name: 'y', kind: 'y' },
  { name: 'z', kind: 'z' },
];

const OPERAND_SEPARATOR = String.raw`\s*,?\s*`;
// Bare tokens must end at a separator so the engine cannot split "1000" into "100" and "0".
const TOKEN_END = String.raw`(?![^\s,])`;
const NUMBER_END = String.raw`(?![\d.])`;

const OPERAND_PATTERNS: Readonly<Record<OperandKind, string>> = {
  identifier: String.raw`"[^"]+"|[^\s,"]+${TOKEN_END}`,
  count: String.raw`\d+${NUMBER_END}`,
  x: String.raw`-?\d+(?:\.\d+)?${NUMBER_END}`,
  y: String.raw`-?\d+(?:\.\d+)?${NUMBER_END}`,
  z: String.raw`-?\d+(?:\.\d+)?${NUMBER_END}`,
  rotation: String.raw`-?\d+(?:\.\d+)?${NUMBER_END}`,
};

function compileRulePattern(keyword: string, operands: readonly OperandSpec[]): RegExp {
  const operandSource = operands
    .map((operand) => {
      const capture = `${OPERAND_SEPARATOR}(?<${operand.name}>${OPERAND_PATTERNS[operand.kind]})`;
      return operand.optional === true ? `(?:${capture})?` : capture;
    })
    .join('');
  return new RegExp(String.raw`(?<![A-Za-z0-9_])(?<keyword>${keyword})(?![A-Za-z0-9_])${operandSource}`, 'gi');
}

function defineRule(kind: CommandKind, keyword: string, label: string, operands: readonly OperandSpec[]): CommandRule {
  return { kind, keyword, label, operands, pattern: compileRulePattern(keyword, operands) };
}

export const COMMAND_RULES: readonly CommandRule[] = [
  defineRule('aiEscort', 'AiEscort', 'AI Escort', [actor, duration, ...triple, reset]),
  defineRule('aiEscortCell', 'AiEscortCell', 'AI Escort Cell', [actor, cell, duration, ...triple, reset]),
  defineRule('aiFollow', 'AiFollow', 'AI Follow', [actor, duration, ...triple, reset]),
  defineRule('aiFollowCell', 'AiFollowCell', 'AI Follow Cell', [actor, cell, duration, ...triple, reset]),
  defineRule('aiTravel', 'AiTravel', 'AI Travel', [...triple, reset]),
  defineRule('position', 'Position', 'Position', [...triple, rotation]),
  defineRule('positionCell', 'PositionCell', 'Position Cell', [...triple, rotation, cell]),
  defineRule('placeItem', 'PlaceItem', 'Place Item', [object, ...triple, rotation]),
  defineRule('placeItemCell', 'PlaceItemCell', 'Place Item Cell', [object, cell, ...triple, rotation]),
];
