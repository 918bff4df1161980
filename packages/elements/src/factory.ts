/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Element construction from parsed element records
 *
 * Every field may be given under its short name or one of its aliases. The
 * alias table below is the single place those names are defined.
 */

import {
  InvalidElementError,
  MissingArgumentError,
  UnknownElementTypeError,
  createLogger,
  isElementType,
} from '@airnet/data';
import type { ElementArguments, ElementType, FanCurveSegment } from '@airnet/data';
import type { AirflowElement, ElementOf, PowerLawCoefficients } from './types.js';

const log = createLogger('ElementFactory');

// ============================================================================
// Alias table
// ============================================================================

const POWER_LAW_ALIASES = {
  init: ['initialization'],
  lam: ['laminar'],
  turb: ['turbulent'],
  expt: ['exponent'],
} as const;

/** Field name -> accepted alternative names, per element type */
export const FIELD_ALIASES = {
  plr: POWER_LAW_ALIASES,
  dwc: {
    length: ['len'],
    hdia: ['dh', 'hydraulicDiameter'],
    area: [],
    rough: ['rgh', 'roughness'],
    tdlc: ['turbulentDynamicLoss'],
    lflc: ['laminarFrictionLoss'],
    ldlc: ['laminarDynamicLoss'],
    init: ['linit', 'initialization'],
  },
  qfr: {
    a: [],
    b: [],
  },
  dor: {
    ...POWER_LAW_ALIASES,
    dtmin: ['minTemperatureDifference'],
    ht: ['height'],
    wd: ['width'],
    cd: ['dischargeCoefficient'],
  },
  cfr: {
    flow: [],
  },
  fan: {
    ...POWER_LAW_ALIASES,
    rdens: ['referenceDensity'],
    fdf: ['freeDeliveryFlow'],
    sop: ['shutOffPressure'],
    off: ['ltt', 'cutoffSpeed'],
    speed: ['relativeSpeed'],
    curve: ['pts'],
  },
  cpf: {
    upo: ['usefulPower'],
    prmin: ['minPressureRise'],
    ftyp: ['typicalFlow'],
  },
  ckv: {
    dp0: ['cutoffPressure'],
    coef: ['coeff'],
  },
  prv: {
    fpos: [],
    cpos: [],
    fneg: [],
    cneg: [],
  },
} as const satisfies Record<ElementType, Record<string, readonly string[]>>;

type FieldName<T extends ElementType> = keyof (typeof FIELD_ALIASES)[T] & string;

// ============================================================================
// Argument reader
// ============================================================================

/**
 * Resolves fields of one element record through the alias table and
 * remembers which supplied names were consumed.
 */
class ArgumentReader<T extends ElementType> {
  private consumed = new Set<string>();

  constructor(
    readonly type: T,
    private readonly args: ElementArguments,
  ) {}

  private aliasesOf(field: FieldName<T>): readonly string[] {
    const table: Record<string, readonly string[]> = FIELD_ALIASES[this.type];
    return table[field] ?? [];
  }

  private lookup(field: FieldName<T>): { key: string; value: unknown } | undefined {
    for (const key of [field, ...this.aliasesOf(field)]) {
      const value = this.args[key];
      if (value !== undefined) {
        this.consumed.add(key);
        return { key, value };
      }
    }
    return undefined;
  }

  /** A finite number; required unless a default is given */
  number(field: FieldName<T>, fallback?: number): number {
    const found = this.lookup(field);
    if (!found) {
      if (fallback !== undefined) return fallback;
      throw new MissingArgumentError(this.type, field, this.aliasesOf(field));
    }
    if (typeof found.value !== 'number' || !Number.isFinite(found.value)) {
      throw new InvalidElementError(this.type, `field "${found.key}" must be a finite number`);
    }
    return found.value;
  }

  curve(field: FieldName<T>): FanCurveSegment[] {
    const found = this.lookup(field);
    if (!found) return [];
    if (!Array.isArray(found.value)) {
      throw new InvalidElementError(this.type, `field "${found.key}" must be a list of curve segments`);
    }
    const segments: FanCurveSegment[] = [];
    for (const item of found.value) {
      segments.push(parseSegment(this.type, item));
    }
    return segments.sort((a, b) => a.maxFlow - b.maxFlow);
  }

  unused(): string[] {
    return Object.keys(this.args).filter((key) => !this.consumed.has(key) && this.args[key] !== undefined);
  }
}

function parseSegment(type: string, item: unknown): FanCurveSegment {
  if (typeof item !== 'object' || item === null || !('maxFlow' in item) || !('coefficients' in item)) {
    throw new InvalidElementError(type, 'curve segments need maxFlow and coefficients');
  }
  const { maxFlow, coefficients } = item;
  if (typeof maxFlow !== 'number' || !Array.isArray(coefficients) || coefficients.length !== 4) {
    throw new InvalidElementError(type, 'curve segments need a numeric maxFlow and four coefficients');
  }
  const [a1, a2, a3, a4]: unknown[] = coefficients;
  if (typeof a1 !== 'number' || typeof a2 !== 'number' || typeof a3 !== 'number' || typeof a4 !== 'number') {
    throw new InvalidElementError(type, 'curve coefficients must be numbers');
  }
  return { maxFlow, coefficients: [a1, a2, a3, a4] };
}

function requireNonNegative(type: string, values: Record<string, number>): void {
  for (const [field, value] of Object.entries(values)) {
    if (!(value >= 0.0)) {
      throw new InvalidElementError(type, `field "${field}" must not be negative, got ${value}`);
    }
  }
}

function requirePositive(type: string, values: Record<string, number>): void {
  for (const [field, value] of Object.entries(values)) {
    if (!(value > 0.0)) {
      throw new InvalidElementError(type, `field "${field}" must be positive, got ${value}`);
    }
  }
}

// ============================================================================
// Builders
// ============================================================================

function powerLawCoefficients(reader: ArgumentReader<'plr' | 'dor' | 'fan'>): PowerLawCoefficients {
  return {
    init: reader.number('init'),
    lam: reader.number('lam'),
    turb: reader.number('turb'),
    expt: reader.number('expt', 0.5),
  };
}

type Builders = { [T in ElementType]: (reader: ArgumentReader<T>) => ElementOf<T> };

const BUILDERS: Builders = {
  plr: (reader) => ({ type: 'plr', ...powerLawCoefficients(reader) }),

  dwc: (reader) => {
    const length = reader.number('length');
    const hdia = reader.number('hdia');
    const area = reader.number('area');
    const rough = reader.number('rough');
    const tdlc = reader.number('tdlc');
    const lflc = reader.number('lflc');
    const ldlc = reader.number('ldlc');
    const init = reader.number('init');
    requirePositive('dwc', { hdia, area });
    // Turbulent loss f * length / hdia + tdlc stays positive for any friction factor f > 0
    requireNonNegative('dwc', { length, tdlc });
    const ld = length / hdia;
    requirePositive('dwc', {
      'lflc * length / hdia + ldlc': lflc * ld + ldlc,
      'length / hdia + tdlc': ld + tdlc,
    });
    return { type: 'dwc', length, hdia, area, rough, tdlc, lflc, ldlc, init, ed: rough / hdia, ld };
  },

  qfr: (reader) => {
    const a = reader.number('a');
    const b = reader.number('b');
    if (a < 0.0 || b < 0.0 || (a === 0.0 && b === 0.0)) {
      throw new InvalidElementError('qfr', 'coefficients must be non-negative and not both zero');
    }
    return { type: 'qfr', a, b };
  },

  dor: (reader) => ({
    type: 'dor',
    ...powerLawCoefficients(reader),
    dtmin: reader.number('dtmin'),
    ht: reader.number('ht'),
    wd: reader.number('wd'),
    cd: reader.number('cd'),
  }),

  cfr: (reader) => ({ type: 'cfr', flow: reader.number('flow') }),

  fan: (reader) => {
    const coeffs = powerLawCoefficients(reader);
    const rdens = reader.number('rdens');
    const fdf = reader.number('fdf');
    const sop = reader.number('sop');
    const off = reader.number('off');
    const speed = reader.number('speed', 1.0);
    const curve = reader.curve('curve');
    requirePositive('fan', { rdens, fdf, sop });
    return { type: 'fan', ...coeffs, rdens, fdf, sop, off, speed, curve };
  },

  cpf: (reader) => {
    const upo = reader.number('upo');
    const prmin = reader.number('prmin');
    const ftyp = reader.number('ftyp');
    requirePositive('cpf', { prmin });
    return { type: 'cpf', upo, prmin, ftyp };
  },

  ckv: (reader) => {
    const dp0 = reader.number('dp0');
    const coef = reader.number('coef');
    if (dp0 < 0.0) {
      throw new InvalidElementError('ckv', `cut-off pressure must not be negative, got ${dp0}`);
    }
    return { type: 'ckv', dp0, coef };
  },

  prv: (reader) => {
    const fpos = reader.number('fpos');
    const cpos = reader.number('cpos');
    const fneg = reader.number('fneg');
    const cneg = reader.number('cneg');
    requirePositive('prv', { cpos, cneg });
    return { type: 'prv', fpos, cpos, fneg, cneg };
  },
};

function build<T extends ElementType>(type: T, args: ElementArguments): ElementOf<T> {
  const reader = new ArgumentReader(type, args);
  const builder: (reader: ArgumentReader<T>) => ElementOf<T> = BUILDERS[type];
  const element = builder(reader);
  const unused = reader.unused();
  if (unused.length > 0) {
    log.debug('Ignoring unrecognized fields', unused, { operation: 'createElement', elementType: type });
  }
  return element;
}

/**
 * Create an element from its type tag and record fields
 *
 * @throws UnknownElementTypeError for a type outside the supported set
 * @throws MissingArgumentError when a required field is absent under every alias
 * @throws InvalidElementError for non-numeric or physically impossible values
 */
export function createElement(type: string, args: ElementArguments): AirflowElement {
  if (!isElementType(type)) {
    throw new UnknownElementTypeError(type);
  }
  return build(type, args);
}
