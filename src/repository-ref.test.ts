import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { formatRepository, parseRepository } from './repository-ref';

describe('parseRepository', () => {
  it('splits owner and name', () => {
    assert.deepEqual(parseRepository('acme/widgets'), { ok: true, reference: { owner: 'acme', name: 'widgets' } });
  });

  it('rejects identifiers without exactly one slash', () => {
    for (const input of ['widgets', '', 'acme/widgets/extra', 'a/b/c/d']) {
      assert.deepEqual(parseRepository(input), { ok: false }, input);
    }
  });

  it('accepts empty segments as-is', () => {
    assert.deepEqual(parseRepository('acme/'), { ok: true, reference: { owner: 'acme', name: '' } });
    assert.deepEqual(parseRepository('/widgets'), { ok: true, reference: { owner: '', name: 'widgets' } });
    assert.deepEqual(parseRepository('/'), { ok: true, reference: { owner: '', name: '' } });
  });

  it('keeps whitespace inside segments', () => {
    assert.deepEqual(parseRepository(' acme / widgets '), { ok: true, reference: { owner: ' acme ', name: ' widgets ' } });
  });
});

describe('formatRepository', () => {
  it('joins owner and name', () => {
    assert.equal(formatRepository({ owner: 'acme', name: 'widgets' }), 'acme/widgets');
  });

  it('formats what parseRepository parsed', () => {
    const parsed = parseRepository('acme/widgets');
    assert.ok(parsed.ok);
    assert.equal(formatRepository(parsed.reference), 'acme/widgets');
  });
});
