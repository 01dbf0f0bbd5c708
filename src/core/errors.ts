export class ManifestParseError extends Error {
  constructor(
    readonly file: string,
    detail: string,
  ) {
    super(`Cannot parse manifest ${file}: ${detail}`);
    this.name = 'ManifestParseError';
  }
}

export class ManifestSchemaError extends Error {
  constructor(
    readonly file: string,
    readonly key: string,
    detail: string,
  ) {
    super(`Invalid manifest ${file} at "${key}": ${detail}`);
    this.name = 'ManifestSchemaError';
  }
}

export class UnknownProfileError extends Error {
  constructor(
    readonly profile: string,
    available: string[],
  ) {
    super(
      `Profile "${profile}" not found` +
        (available.length ? ` (available: ${available.join(', ')})` : ''),
    );
    this.name = 'UnknownProfileError';
  }
}

export class UnknownPackageError extends Error {
  constructor(readonly packageName: string) {
    super(`Package "${packageName}" not found in manifest`);
    this.name = 'UnknownPackageError';
  }
}

/** Raised when the operator aborts during issue resolution. */
export class InstallAbortedError extends Error {
  constructor() {
    super('Installation cancelled by user');
    this.name = 'InstallAbortedError';
  }
}

export class RetryLogError extends Error {
  constructor(
    readonly file: string,
    detail: string,
  ) {
    super(`Cannot read retry log ${file}: ${detail}`);
    this.name = 'RetryLogError';
  }
}
