/**
 * JSON Path Resolution Tests
 */

import { describe, it, expect } from 'vitest';
import { firstPresent, isValidPath, parsePath, resolvePath } from '../../../core/utils/json-path.js';

const DOC = {
  estadisticas: { distribucion_votos: { validos: 950 } },
  resultados: [{ votos: 500 }, { votos: 450 }],
  vacio: null,
  cero: 0,
};

describe('resolvePath', () => {
  it('walks nested objects', () => {
    expect(resolvePath(DOC, 'estadisticas.distribucion_votos.validos')).toBe(950);
  });

  it('indexes arrays with numeric segments', () => {
    expect(resolvePath(DOC, 'resultados.1.votos')).toBe(450);
  });

  it('returns undefined for absent segments', () => {
    expect(resolvePath(DOC, 'estadisticas.actas.procesadas')).toBeUndefined();
    expect(resolvePath(DOC, 'resultados.x')).toBeUndefined();
    expect(resolvePath(DOC, 'resultados.5.votos')).toBeUndefined();
  });

  it('ignores inherited properties', () => {
    expect(resolvePath(DOC, 'toString')).toBeUndefined();
  });

  it('returns null members as null', () => {
    expect(resolvePath(DOC, 'vacio')).toBeNull();
  });
});

describe('parsePath', () => {
  it('splits on dots', () => {
    expect(parsePath('a.b.0')).toEqual(['a', 'b', '0']);
  });

  it('rejects empty segments', () => {
    expect(() => parsePath('a..b')).toThrow('Invalid JSON path "a..b": empty segment');
    expect(isValidPath('a..b')).toBe(false);
    expect(isValidPath('')).toBe(false);
    expect(isValidPath('a.b')).toBe(true);
  });
});

describe('firstPresent', () => {
  it('skips missing and null values but keeps zero', () => {
    expect(firstPresent(DOC, ['missing', 'vacio', 'cero', 'resultados'])).toEqual({
      path: 'cero',
      value: 0,
    });
  });

  it('returns undefined when nothing matches', () => {
    expect(firstPresent(DOC, ['a', 'b'])).toBeUndefined();
  });
});
