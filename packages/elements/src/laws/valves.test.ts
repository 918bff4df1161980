/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { createNode } from '@airnet/data';
import type { FlowPath } from '@airnet/data';
import { checkValve, reliefValve, reliefValveLinearization } from './valves.js';
import type { CkvElement, PrvElement } from '../types.js';

function path(): FlowPath {
  return {
    node0: createNode({ name: 'upstream', temperature: 293.15, pressure: 0 }),
    node1: createNode({ name: 'downstream', temperature: 293.15, pressure: 0 }),
  };
}

describe('checkValve', () => {
  const CKV: CkvElement = { type: 'ckv', dp0: 5.0, coef: 0.01 };

  it('stays closed below the cut-off pressure', () => {
    expect(checkValve(CKV, path(), 3).flow1).toBe(0);
    expect(checkValve(CKV, path(), 3).dflow1).toBe(0);
  });

  it('blocks reverse flow', () => {
    expect(checkValve(CKV, path(), -50).flow1).toBe(0);
    expect(checkValve({ type: 'ckv', dp0: 0.0, coef: 0.01 }, path(), -50).flow1).toBe(0);
  });

  it('opens as an orifice on the excess pressure', () => {
    const p = path();
    const result = checkValve(CKV, p, 9);
    const flow = 0.01 * p.node0.sqrtDensity * 2;
    expect(result.flow1).toBe(flow);
    expect(result.dflow1).toBe(0.5 * flow / 4);
  });

  it('starts from zero flow at the cut-off pressure', () => {
    const p = path();
    expect(checkValve(CKV, p, 5).flow1).toBe(0);
    // 0.01 * sqrt(1.20415) * sqrt(9 - 5)
    expect(checkValve(CKV, p, 9).flow1).toBeCloseTo(0.021946737, 8);
    expect(checkValve(CKV, p, 5.01).flow1).toBeCloseTo(0.01 * p.node0.sqrtDensity * Math.sqrt(0.01), 12);
  });
});

describe('reliefValve', () => {
  const PRV: PrvElement = { type: 'prv', fpos: 0.2, cpos: 50.0, fneg: 0.1, cneg: 25.0 };

  it('is closed between the relief pressures', () => {
    for (const pdrop of [-25, -10, 0, 30, 50]) {
      expect(reliefValve(PRV, pdrop).flow1).toBe(0);
    }
  });

  it('reaches the design flow at twice the relief pressure', () => {
    const result = reliefValve(PRV, 100);
    expect(result.flow1).toBeCloseTo(0.2, 12);
    expect(result.dflow1).toBeCloseTo(0.004, 12);
  });

  it('relieves in the negative direction', () => {
    const result = reliefValve(PRV, -50);
    expect(result.flow1).toBeCloseTo(-0.1, 12);
    expect(result.dflow1).toBeCloseTo(0.004, 12);
  });

  it('linearizes with the mean opening slope', () => {
    expect(reliefValveLinearization(PRV)).toBeCloseTo(0.004, 12);
  });
});
