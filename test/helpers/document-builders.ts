export type TestRecord = Record<string, unknown> & { type: string };

export function headerRecord(masters: readonly string[], description = 'Test plugin'): TestRecord {
  return {
    type: 'Header',
    flags: '',
    version: 1.3,
    file_type: 'Esp',
    author: 'tester',
    description,
    num_objects: 0,
    masters: masters.map((name) => [name, 0]),
  };
}

export const BLOODMOON_MASTERS: readonly string[] = ['Morrowind.esm', 'Tribunal.esm', 'Bloodmoon.esm'];

export function exteriorCell(gx: number, gy: number, references: readonly unknown[] = []): TestRecord {
  return {
    type: 'Cell',
    flags: '',
    id: '',
    data: { flags: '', grid: [gx, gy] },
    references: [...references],
  };
}

export function interiorCell(id: string, references: readonly unknown[]): TestRecord {
  return {
    type: 'Cell',
    flags: '',
    id,
    data: { flags: 'IS_INTERIOR | HAS_WATER', grid: [0, 0] },
    references: [...references],
  };
}

export function scriptRecord(id: string, text: string): TestRecord {
  return { type: 'Script', flags: '', id, text };
}

export function dialogueInfo(id: string, scriptText: string): TestRecord {
  return { type: 'DialogueInfo', flags: '', id, script_text: scriptText };
}
