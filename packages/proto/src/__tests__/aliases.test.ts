import { describe, it, expect } from 'vitest';
import { BULK_FIELD_ALIASES, SINGLE_FIELD_ALIASES, resolveAliasedFields } from '../aliases';

describe('resolveAliasedFields', () => {
  it('maps an alias onto the canonical field', () => {
    expect(resolveAliasedFields({ noms: ['Alice'] }, BULK_FIELD_ALIASES, ['participants'])).toEqual({
      participants: ['Alice'],
    });
  });

  it('prefers the earlier alias', () => {
    expect(resolveAliasedFields({ numeros: [2], gifts: [1] }, BULK_FIELD_ALIASES, ['gifts'])).toEqual({ gifts: [1] });
  });

  it('resolves several fields at once', () => {
    expect(
      resolveAliasedFields({ hommes: [1], femmes: [2], other: true }, BULK_FIELD_ALIASES, ['men', 'women']),
    ).toEqual({ men: [1], women: [2] });
  });

  it('leaves out fields with no alias present', () => {
    expect(resolveAliasedFields({ femmes: [2] }, BULK_FIELD_ALIASES, ['men', 'women'])).toEqual({ women: [2] });
  });

  it('resolves single-value aliases', () => {
    expect(resolveAliasedFields({ numero: 'H1' }, SINGLE_FIELD_ALIASES, ['participant'])).toEqual({
      participant: 'H1',
    });
  });

  it('returns nothing for a body that is not an object', () => {
    expect(resolveAliasedFields(null, BULK_FIELD_ALIASES, ['participants'])).toEqual({});
    expect(resolveAliasedFields(['Alice'], BULK_FIELD_ALIASES, ['participants'])).toEqual({});
  });
});
