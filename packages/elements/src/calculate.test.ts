/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { UnimplementedLawError, createNode } from '@airnet/data';
import type { FlowPath } from '@airnet/data';
import { calculate, linearize } from './calculate.js';
import { createElement } from './factory.js';
import { powerLaw } from './laws/power-law.js';
import type { AirflowElement, PlrElement } from './types.js';

function path(): FlowPath {
  return {
    node0: createNode({ name: 'a', temperature: 293.15, pressure: 0 }),
    node1: createNode({ name: 'b', temperature: 298.15, pressure: 0 }),
  };
}

const PLR: PlrElement = { type: 'plr', init: 2.569e-7, lam: 2.569e-7, turb: 0.000848528, expt: 0.5 };

const SAMPLES: AirflowElement[] = [
  PLR,
  createElement('dwc', { len: 5, dh: 0.15, area: 0.0177, rgh: 0.00009, tdlc: 1, lflc: 64, ldlc: 0, init: 1e-6 }),
  createElement('qfr', { a: 10, b: 200 }),
  createElement('dor', { init: 1e-4, lam: 1e-4, turb: 0.08, expt: 0.5, dtmin: 1, ht: 2, wd: 0.9, cd: 0.78 }),
  createElement('cfr', { flow: 0.02 }),
  createElement('fan', { init: 1e-6, lam: 1e-6, turb: 0.001, expt: 0.5, rdens: 1.2, fdf: 0.3, sop: 200, off: 0.1 }),
  createElement('cpf', { upo: 15, prmin: 10, ftyp: 0.05 }),
  createElement('ckv', { dp0: 2, coef: 0.004 }),
  createElement('prv', { fpos: 0.1, cpos: 40, fneg: 0.1, cneg: 40 }),
];

describe('calculate', () => {
  it('evaluates every element type', () => {
    const p = path();
    for (const element of SAMPLES) {
      for (const pdrop of [-60, -1, 0, 1, 60]) {
        const result = calculate(element, p, pdrop);
        expect(Number.isFinite(result.flow1), `${element.type} @ ${pdrop}`).toBe(true);
        expect(Number.isFinite(result.dflow1), `${element.type} @ ${pdrop}`).toBe(true);
      }
    }
  });

  it('dispatches to the element law', () => {
    const p = path();
    expect(calculate(PLR, p, 3)).toEqual(powerLaw(PLR, p, 3));
  });

  it('fails loudly for an element without a law', () => {
    const bogus: AirflowElement = JSON.parse('{"type":"xyz"}');
    expect(() => calculate(bogus, path(), 1)).toThrow(UnimplementedLawError);
    expect(() => linearize(bogus, path())).toThrow('No flow law is implemented for element type "xyz"');
  });
});

describe('linearize', () => {
  it('returns a finite initial slope for every element type', () => {
    const p = path();
    for (const element of SAMPLES) {
      expect(Number.isFinite(linearize(element, p)), element.type).toBe(true);
    }
  });

  it('uses the init coefficient for power-law elements', () => {
    const p = path();
    expect(linearize(PLR, p)).toBe(0.5 * 2.569e-7 * (p.node0.dvisc + p.node1.dvisc));
  });

  it('returns zero for a constant flow source', () => {
    expect(linearize(SAMPLES[4], path())).toBe(0);
  });
});
