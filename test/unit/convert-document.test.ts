import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { DocumentConversionOutcome } from '../../src/kernel/index.js';
import { convertDocument } from '../../src/kernel/index.js';
import { createTestContext } from '../helpers/context-helpers.js';
import { diagnosticCodes } from '../helpers/diagnostic-helpers.js';
import { BLOODMOON_MASTERS, exteriorCell, headerRecord, scriptRecord } from '../helpers/document-builders.js';
import { readJsonFixture } from '../helpers/fixture-reader.js';

const KNOWN_CELL = { gx: 10, gy: 4 };

function convertedRecords(outcome: DocumentConversionOutcome): readonly unknown[] {
  assert.equal(outcome.status, 'converted');
  return outcome.status === 'converted' ? outcome.records : [];
}

describe('convertDocument', () => {
  it('converts the sample plugin forward', () => {
    const { context } = createTestContext({ region: [KNOWN_CELL] });

    const outcome = convertDocument(readJsonFixture('sample-plugin.json'), context);

    assert.equal(outcome.status, 'converted');
    if (outcome.status !== 'converted') {
      return;
    }
    assert.equal(outcome.layout, 'M+T+B');
    assert.deepEqual(outcome.touchedScriptIds, ['test_escort']);
    assert.deepEqual(outcome.records, [
      {
        type: 'Header',
        flags: '',
        version: 1.3,
        file_type: 'Esp',
        author: 'tester',
        description: '[BM->AB] Sample test plugin',
        num_objects: 6,
        masters: [
          ['Morrowind.esm', 79837557],
          ['Tribunal.esm', 4565686],
          ['Bloodmoon.esm', 9631798],
        ],
      },
      {
        type: 'Cell',
        flags: '',
        id: '',
        data: { flags: '', grid: [17, 10] },
        region: '',
        references: [
          {
            mast_index: 0,
            refr_index: 1,
            id: 'flora_01',
            temporary: true,
            translation: [139344.5, 82152.25, 120],
            rotation: [0, 0, 0],
          },
          {
            mast_index: 3,
            refr_index: 2,
            id: 'door_01',
            translation: [83000, 33500, 0],
            rotation: [0, 0, 0],
          },
        ],
      },
      { type: 'Landscape', flags: '', grid: [17, 10], landscape_flags: '' },
      {
        type: 'PathGrid',
        flags: '',
        cell: '',
        data: { grid: [17, 10], granularity: 1024 },
        points: [],
        connections: [],
      },
      {
        type: 'Npc',
        flags: '',
        id: 'test_boatman',
        name: 'Boatman',
        travel_destinations: [{ translation: [140344, 82652, 0], rotation: [0, 0, 0], cell: '' }],
      },
      {
        type: 'Script',
        flags: '',
        id: 'test_escort',
        text: 'Begin test_escort\n\nAiEscort, player, 60, 140344.000, 82652.000, 100.000\n\nEnd test_escort',
      },
      {
        type: 'DialogueInfo',
        flags: '',
        id: '100200300',
        script_text: 'PlaceItem, "gold_001", 140344.000, 82652.000, 0.000, 0',
      },
    ]);
  });

  it('forwards its diagnostics to the context sink', () => {
    const { context, collector } = createTestContext({ region: [KNOWN_CELL] });

    const outcome = convertDocument(readJsonFixture('sample-plugin.json'), context);

    assert.deepEqual(diagnosticCodes(collector.diagnostics), diagnosticCodes(outcome.diagnostics));
    assert.equal(outcome.diagnostics[0]?.code, 'MASTER_ORDER_VALID');
    assert.equal(outcome.diagnostics[0]?.message, 'Valid order of parent master files found: M+T+B.');
  });

  it('skips a second pass without touching the document', () => {
    const { context } = createTestContext({ region: [KNOWN_CELL] });
    const records = convertedRecords(convertDocument(readJsonFixture('sample-plugin.json'), context));
    const snapshot = structuredClone(records);

    const second = convertDocument(records, context);

    assert.equal(second.status, 'skipped');
    assert.equal(second.status === 'skipped' ? second.reason : undefined, 'already-converted');
    assert.equal(second.status === 'skipped' ? second.previousDirection : undefined, 'bm-to-ab');
    assert.deepEqual(records, snapshot);
  });

  it('rejects documents marked by the other direction as well', () => {
    const { context } = createTestContext({ direction: 'ab-to-bm', region: [KNOWN_CELL] });
    const document = [headerRecord(BLOODMOON_MASTERS, '[BM->AB] mod'), exteriorCell(17, 10)];

    const outcome = convertDocument(document, context);

    assert.equal(outcome.status === 'skipped' ? outcome.reason : undefined, 'already-converted');
    assert.deepEqual(document[1], exteriorCell(17, 10));
  });

  it('brings structured fields back with the opposite direction', () => {
    const forward = createTestContext({ direction: 'bm-to-ab', region: [KNOWN_CELL] });
    const backward = createTestContext({ direction: 'ab-to-bm', region: [KNOWN_CELL] });
    const records = convertedRecords(convertDocument(readJsonFixture('sample-plugin.json'), forward.context));
    const [header, cell, , , npc] = records;
    assert.ok(header !== null && typeof header === 'object' && 'description' in header);
    header.description = 'Sample test plugin';

    const outcome = convertDocument(records, backward.context);

    assert.equal(outcome.status, 'converted');
    assert.equal(header.description, '[AB->BM] Sample test plugin');
    assert.deepEqual(cell, {
      type: 'Cell',
      flags: '',
      id: '',
      data: { flags: '', grid: [10, 4] },
      region: '',
      references: [
        {
          mast_index: 0,
          refr_index: 1,
          id: 'flora_01',
          temporary: true,
          translation: [82000.5, 33000.25, 120],
          rotation: [0, 0, 0],
        },
        { mast_index: 3, refr_index: 2, id: 'door_01', translation: [83000, 33500, 0], rotation: [0, 0, 0] },
      ],
    });
    assert.deepEqual(npc, {
      type: 'Npc',
      flags: '',
      id: 'test_boatman',
      name: 'Boatman',
      travel_destinations: [{ translation: [83000, 33500, 0], rotation: [0, 0, 0], cell: '' }],
    });
  });

  it('skips documents with nothing to translate and leaves the Header unmarked', () => {
    const { context, collector } = createTestContext();
    const header = headerRecord(BLOODMOON_MASTERS, 'mod');

    const outcome = convertDocument([header, exteriorCell(10, 4)], context);

    assert.equal(outcome.status === 'skipped' ? outcome.reason : undefined, 'no-changes');
    assert.equal(header.description, 'mod');
    assert.equal(collector.diagnostics.at(-1)?.code, 'NO_REPLACEMENTS');
  });

  it('fails when the decoded value is not a record list', () => {
    const outcome = convertDocument({ type: 'Header' }, createTestContext().context);

    assert.equal(outcome.status === 'failed' ? outcome.error.code : undefined, 'DOCUMENT_MALFORMED');
  });

  it('fails on a bad master order before touching any record', () => {
    const { context } = createTestContext({ region: [KNOWN_CELL] });
    const cell = exteriorCell(10, 4);

    const outcome = convertDocument([headerRecord(['Bloodmoon.esm', 'Morrowind.esm']), cell], context);

    assert.equal(outcome.status === 'failed' ? outcome.error.code : undefined, 'MASTER_ORDER_INVALID');
    assert.deepEqual(cell.data, { flags: '', grid: [10, 4] });
  });

  it('fails when a command operand cannot be read', () => {
    const { context } = createTestContext({ region: [KNOWN_CELL] });
    const document = [headerRecord(BLOODMOON_MASTERS), scriptRecord('broken', `AiTravel ${'9'.repeat(400)} 0 0`)];

    const outcome = convertDocument(document, context);

    assert.equal(outcome.status === 'failed' ? outcome.error.code : undefined, 'COMMAND_OPERAND_INVALID');
  });

  it('fails when the Header has no description to mark', () => {
    const { context } = createTestContext({ region: [KNOWN_CELL] });
    const document = [{ type: 'Header', masters: [['Morrowind.esm', 0], ['Bloodmoon.esm', 0]] }, exteriorCell(10, 4)];

    const outcome = convertDocument(document, context);

    assert.equal(outcome.status === 'failed' ? outcome.error.code : undefined, 'HEADER_DESCRIPTION_MISSING');
  });

  it('reads the masters even when the description has the wrong type', () => {
    const { context } = createTestContext({ region: [KNOWN_CELL] });
    const header = { type: 'Header', description: null, masters: [['Morrowind.esm', 0], ['Bloodmoon.esm', 0]] };

    const outcome = convertDocument([header, exteriorCell(10, 4)], context);

    assert.equal(outcome.status === 'failed' ? outcome.error.code : undefined, 'HEADER_DESCRIPTION_MISSING');
  });
});
