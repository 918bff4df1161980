/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { createNode } from '@airnet/data';
import type { FlowPath } from '@airnet/data';
import { duct, roughFrictionFactor, turbulentDuctFlow } from './duct.js';
import type { DwcElement } from '../types.js';

const DUCT: DwcElement = {
  type: 'dwc',
  length: 10.0,
  hdia: 0.2,
  area: 0.0314,
  rough: 0.0001,
  tdlc: 1.5,
  lflc: 64.0,
  ldlc: 0.0,
  init: 1e-6,
  ed: 0.0005,
  ld: 50.0,
};

function path(): FlowPath {
  return {
    node0: createNode({ name: 'supply', temperature: 293.15, pressure: 0 }),
    node1: createNode({ name: 'room', temperature: 293.15, pressure: 0 }),
  };
}

describe('roughFrictionFactor', () => {
  it('matches the von Karman fully rough value', () => {
    // 1/sqrt(f) = -2 log10(0.0005 / 3.7)
    expect(roughFrictionFactor(0.0005)).toBeCloseTo(0.01670, 4);
  });
});

describe('duct', () => {
  it('returns zero flow with the averaged laminar slope at zero pressure drop', () => {
    const p = path();
    const result = duct(DUCT, p, 0);
    expect(result.flow1).toBe(0);
    expect(result.dflow1).toBeCloseTo(
      0.5 * (2 * 0.0314 * 0.2 / (64 * 50)) * (p.node0.dvisc + p.node1.dvisc),
      12,
    );
  });

  it('is laminar at very small pressure drops', () => {
    const p = path();
    const cdm = (2 * 0.0314 * 0.2 / (64 * 50)) * p.node0.dvisc;
    const result = duct(DUCT, p, 1e-4);
    expect(result.flow1).toBeCloseTo(cdm * 1e-4, 12);
    expect(result.dflow1).toBeCloseTo(cdm, 10);
  });

  it('satisfies Darcy-Weisbach with a Colebrook friction factor when turbulent', () => {
    const p = path();
    const pdrop = 100;
    const result = duct(DUCT, p, pdrop);
    const flow = result.flow1;
    const rho = p.node0.density;

    const f = (2 * rho * DUCT.area * DUCT.area * pdrop / (flow * flow) - DUCT.tdlc) / DUCT.ld;
    const reynolds = flow * DUCT.hdia / (p.node0.viscosity * DUCT.area);
    const residual = 1 / Math.sqrt(f) + 2 * Math.log10(DUCT.ed / 3.7 + 2.51 / (reynolds * Math.sqrt(f)));

    expect(reynolds).toBeGreaterThan(4000);
    expect(Math.abs(residual)).toBeLessThan(1e-6);
    expect(result.dflow1).toBeCloseTo(0.5 * flow / pdrop, 12);
  });

  it('mirrors reverse flow through node1', () => {
    const p = path();
    const forward = duct(DUCT, p, 40);
    const reverse = duct(DUCT, p, -40);
    expect(reverse.flow1).toBe(-forward.flow1);
    expect(reverse.dflow1).toBe(forward.dflow1);
  });

  it('grows with pressure drop', () => {
    const p = path();
    let previous = 0;
    for (const pdrop of [0.001, 0.1, 1, 10, 100, 1000]) {
      const flow = duct(DUCT, p, pdrop).flow1;
      expect(flow).toBeGreaterThan(previous);
      previous = flow;
    }
  });
});

describe('turbulentDuctFlow', () => {
  it('handles a smooth duct', () => {
    const smooth: DwcElement = { ...DUCT, rough: 0, ed: 0 };
    const p = path();
    const flow = turbulentDuctFlow(smooth, 100, p.node0.density, p.node0.viscosity);
    expect(Number.isFinite(flow)).toBe(true);
    expect(flow).toBeGreaterThan(turbulentDuctFlow(DUCT, 100, p.node0.density, p.node0.viscosity));
  });
});
