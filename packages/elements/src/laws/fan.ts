/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Fan with a performance curve
 *
 * The curve gives pressure rise against mass flow at the reference density
 * and rated speed. Fan laws scale it to the running point:
 *
 *   F = s·r·F_ref,   rise = s²·r·rise_ref,   r = ρ0 / rdens
 *
 * Pressure rise is the negated pressure drop, so a running fan pushes air
 * from node0 to node1 against an adverse pressure difference. Below its
 * cut-off speed the fan is treated as a power-law leak.
 */

import type { FanCurveSegment, FlowPath } from '@airnet/data';
import { oneWay } from '../types.js';
import type { FanElement, FlowResult } from '../types.js';
import { powerLaw } from './power-law.js';

const BISECTION_STEPS = 80;

interface CurvePoint {
  /** Mass flow at reference conditions (kg/s) */
  flow: number;
  /** d(rise)/d(flow) at that point, negative on a stable curve */
  slope: number;
}

export function isFanOff(element: FanElement): boolean {
  return element.speed <= 0.0 || element.speed < element.off;
}

function segmentAt(curve: readonly FanCurveSegment[], flow: number): FanCurveSegment {
  for (const segment of curve) {
    if (flow <= segment.maxFlow) {
      return segment;
    }
  }
  return curve[curve.length - 1];
}

function evaluate(segment: FanCurveSegment, flow: number): number {
  const [a1, a2, a3, a4] = segment.coefficients;
  return a1 + flow * (a2 + flow * (a3 + flow * a4));
}

function derivative(segment: FanCurveSegment, flow: number): number {
  const [, a2, a3, a4] = segment.coefficients;
  return a2 + flow * (2.0 * a3 + flow * 3.0 * a4);
}

/** Straight line through (0, sop) and (fdf, 0) */
function linearPoint(element: FanElement, rise: number): CurvePoint {
  return {
    flow: element.fdf * (1.0 - rise / element.sop),
    slope: -element.sop / element.fdf,
  };
}

/**
 * Find the reference flow that produces a reference pressure rise
 */
export function invertFanCurve(element: FanElement, rise: number): CurvePoint {
  const { curve } = element;
  if (curve.length === 0 || rise < 0.0 || rise > element.sop) {
    return linearPoint(element, rise);
  }

  const residual = (flow: number): number => evaluate(segmentAt(curve, flow), flow) - rise;
  let lo = 0.0;
  let hi = element.fdf;
  if (residual(lo) < 0.0 || residual(hi) > 0.0) {
    // Curve does not span the shut-off / free-delivery range
    return linearPoint(element, rise);
  }

  for (let i = 0; i < BISECTION_STEPS; i++) {
    const mid = 0.5 * (lo + hi);
    if (residual(mid) > 0.0) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  const flow = 0.5 * (lo + hi);
  const slope = derivative(segmentAt(curve, flow), flow);
  if (slope >= 0.0) {
    return { flow, slope: linearPoint(element, rise).slope };
  }
  return { flow, slope };
}

export function fan(element: FanElement, path: FlowPath, pdrop: number): FlowResult {
  if (isFanOff(element)) {
    return powerLaw(element, path, pdrop);
  }

  const s = element.speed;
  const r = path.node0.density / element.rdens;
  const point = invertFanCurve(element, -pdrop / (s * s * r));
  return oneWay(s * r * point.flow, -1.0 / (s * point.slope));
}
