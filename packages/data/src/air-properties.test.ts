/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { computeAirProperties, updateNodeProperties } from './air-properties.js';
import { createNode } from './network-types.js';

describe('computeAirProperties', () => {
  it('gives standard air density at 20 C and zero gauge pressure', () => {
    const props = computeAirProperties(293.15, 0);
    // 0.0034838 * 101325 / 293.15 = 1.20414..., not the rounded 1.2045 sometimes quoted
    expect(props.density).toBeCloseTo(1.2041, 3);
    expect(props.sqrtDensity).toBeCloseTo(Math.sqrt(props.density), 12);
  });

  it('uses the linear viscosity fit', () => {
    expect(computeAirProperties(273.15, 0).viscosity).toBe(1.71432e-5);
    expect(computeAirProperties(293.15, 0).viscosity).toBeCloseTo(1.71432e-5 + 20 * 4.828e-8, 15);
  });

  it('computes the density to viscosity ratio', () => {
    const props = computeAirProperties(300, 50);
    expect(props.dvisc).toBe(props.density / props.viscosity);
  });

  it('increases density monotonically with pressure', () => {
    const pressures = [-500, -10, 0, 10, 500, 5000];
    const densities = pressures.map((p) => computeAirProperties(293.15, p).density);
    for (let i = 1; i < densities.length; i++) {
      expect(densities[i]).toBeGreaterThan(densities[i - 1]);
    }
  });

  it('does not throw for a zero temperature', () => {
    const props = computeAirProperties(0, 0);
    expect(props.density).toBe(Infinity);
    expect(props.dvisc).toBe(Infinity);
  });
});

describe('updateNodeProperties', () => {
  it('is bit-identical when called twice with unchanged state', () => {
    const node = createNode({ name: 'zone', temperature: 295.4, pressure: -12.5 });
    const first = { ...node };
    updateNodeProperties(node);
    updateNodeProperties(node);
    expect(node.density).toBe(first.density);
    expect(node.viscosity).toBe(first.viscosity);
    expect(node.sqrtDensity).toBe(first.sqrtDensity);
    expect(node.dvisc).toBe(first.dvisc);
  });

  it('follows pressure changes', () => {
    const node = createNode({ name: 'zone', temperature: 293.15, pressure: 0 });
    const before = node.density;
    node.pressure = 100;
    updateNodeProperties(node);
    expect(node.density).toBeGreaterThan(before);
    expect(node.density).toBe(computeAirProperties(293.15, 100).density);
  });
});

describe('createNode', () => {
  it('applies defaults and computes properties', () => {
    const node = createNode({ name: 'n' });
    expect(node.variable).toBe(true);
    expect(node.height).toBe(0);
    expect(node.temperature).toBe(293.15);
    expect(node.pressure).toBe(0);
    expect(node.index).toBeUndefined();
    expect(node.density).toBe(computeAirProperties(293.15, 0).density);
  });
});
