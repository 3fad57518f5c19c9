import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { ConversionErrorCode } from '../../src/kernel/index.js';
import { checkDependencyOrder } from '../../src/kernel/index.js';
import { headerRecord } from '../helpers/document-builders.js';

function errorCodeFor(masters: readonly string[]): ConversionErrorCode | undefined {
  const result = checkDependencyOrder([headerRecord(masters)]);
  return result.ok ? undefined : result.error.code;
}

describe('checkDependencyOrder', () => {
  it('accepts Morrowind, Tribunal, Bloodmoon', () => {
    const result = checkDependencyOrder([headerRecord(['Morrowind.esm', 'Tribunal.esm', 'Bloodmoon.esm', 'Extra.esp'])]);

    assert.deepEqual(result, {
      ok: true,
      layout: 'M+T+B',
      masters: ['Morrowind.esm', 'Tribunal.esm', 'Bloodmoon.esm', 'Extra.esp'],
    });
  });

  it('accepts Morrowind then Bloodmoon without Tribunal', () => {
    const result = checkDependencyOrder([headerRecord(['Morrowind.esm', 'Bloodmoon.esm'])]);
    assert.equal(result.ok && result.layout, 'M+B');
  });

  it('compares master names case-insensitively', () => {
    const result = checkDependencyOrder([headerRecord(['morrowind.ESM', 'BLOODMOON.esm'])]);
    assert.equal(result.ok, true);
  });

  it('rejects every other ordering', () => {
    assert.equal(errorCodeFor(['Bloodmoon.esm', 'Morrowind.esm']), 'MASTER_ORDER_INVALID');
    assert.equal(errorCodeFor(['Morrowind.esm', 'Bloodmoon.esm', 'Tribunal.esm']), 'MASTER_ORDER_INVALID');
    assert.equal(errorCodeFor(['Tribunal.esm', 'Morrowind.esm', 'Bloodmoon.esm']), 'MASTER_ORDER_INVALID');
  });

  it('names the missing master', () => {
    assert.equal(errorCodeFor(['Morrowind.esm', 'Tribunal.esm']), 'MASTER_EXPANSION_MISSING');
    assert.equal(errorCodeFor(['Tribunal.esm', 'Bloodmoon.esm']), 'MASTER_BASE_MISSING');
    assert.equal(errorCodeFor([]), 'MASTER_BASE_MISSING');
  });

  it('carries the declared masters in the error context', () => {
    const result = checkDependencyOrder([headerRecord(['Bloodmoon.esm', 'Morrowind.esm'])]);

    assert.equal(result.ok, false);
    if (!result.ok && result.error.code === 'MASTER_ORDER_INVALID') {
      assert.deepEqual(result.error.context, { masters: ['Bloodmoon.esm', 'Morrowind.esm'] });
    }
  });

  it('requires a Header with a masters list', () => {
    const noHeader = checkDependencyOrder([{ type: 'Cell' }]);
    const noMasters = checkDependencyOrder([{ type: 'Header', description: '' }]);

    assert.equal(noHeader.ok ? undefined : noHeader.error.code, 'HEADER_MISSING');
    assert.equal(noMasters.ok ? undefined : noMasters.error.code, 'MASTERS_MISSING');
  });
});
