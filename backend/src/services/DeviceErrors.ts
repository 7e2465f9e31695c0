import { ProbeErrorKind } from '../types/Update';

export class ProbeError extends Error {
  readonly kind: ProbeErrorKind;

  constructor(kind: ProbeErrorKind, message: string) {
    super(message);
    this.name = 'ProbeError';
    this.kind = kind;
  }
}

export class UpgradeCommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UpgradeCommandError';
  }
}
