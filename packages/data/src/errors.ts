/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Error types raised while building or evaluating an airflow network.
 *
 * All of them describe bad input data or a programming error; none is
 * retried by the library.
 */

export class AirflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AirflowError';
  }
}

/** A required element field is absent under every accepted alias */
export class MissingArgumentError extends AirflowError {
  constructor(
    public readonly elementType: string,
    public readonly field: string,
    public readonly aliases: readonly string[] = [],
  ) {
    const names = aliases.length > 0 ? ` (accepted names: ${aliases.join(', ')})` : '';
    super(`Element type "${elementType}" requires field "${field}"${names}`);
    this.name = 'MissingArgumentError';
  }
}

/** An element field has the wrong shape or an impossible value */
export class InvalidElementError extends AirflowError {
  constructor(
    public readonly elementType: string,
    message: string,
  ) {
    super(`Element type "${elementType}": ${message}`);
    this.name = 'InvalidElementError';
  }
}

export class UnknownElementTypeError extends AirflowError {
  constructor(public readonly elementType: string) {
    super(`Element type "${elementType}" not recognized`);
    this.name = 'UnknownElementTypeError';
  }
}

/** A link names a node or element that was never declared */
export class UnresolvedReferenceError extends AirflowError {
  constructor(
    public readonly linkName: string,
    public readonly referenceKind: 'node' | 'element',
    public readonly reference: string,
  ) {
    super(`Link "${linkName}" references undeclared ${referenceKind} "${reference}"`);
    this.name = 'UnresolvedReferenceError';
  }
}

export class DuplicateTitleError extends AirflowError {
  constructor(
    public readonly existing: string,
    public readonly duplicate: string,
  ) {
    super(`Found additional title "${duplicate}" after "${existing}"`);
    this.name = 'DuplicateTitleError';
  }
}

/** calculate/linearize invoked on an element with no flow law */
export class UnimplementedLawError extends AirflowError {
  constructor(public readonly elementType: string) {
    super(`No flow law is implemented for element type "${elementType}"`);
    this.name = 'UnimplementedLawError';
  }
}
