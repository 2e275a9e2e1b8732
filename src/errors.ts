export type LvbErrorCode =
  | 'MalformedHeader'
  | 'CorruptSection'
  | 'MissingRequiredSection'
  | 'UnresolvedReference'
  | 'InvalidEncoding'
  | 'OffsetOutOfRange'
  | 'NotFound';

/**
 * Base class of every failure raised while decoding or querying a container.
 */
export class LvbError extends Error {
  readonly code: LvbErrorCode;

  constructor(code: LvbErrorCode, message: string) {
    super(message);
    this.name = `${code}Error`;
    this.code = code;
  }
}

/** File signature or file header is unusable */
export class MalformedHeaderError extends LvbError {
  constructor(message: string) {
    super('MalformedHeader', message);
  }
}

/**
 * Section geometry disagrees with its declared size or with the container.
 * Offsets after a corrupt section cannot be trusted, so decoding stops.
 */
export class CorruptSectionError extends LvbError {
  readonly offset: number;
  readonly magic: string;

  constructor(offset: number, magic: string, reason: string) {
    super('CorruptSection', `Corrupt section ${JSON.stringify(magic)} at 0x${offset.toString(16)}: ${reason}`);
    this.offset = offset;
    this.magic = magic;
  }
}

export class MissingRequiredSectionError extends LvbError {
  readonly magic: string;

  constructor(magic: string) {
    super('MissingRequiredSection', `Required section ${magic} not found`);
    this.magic = magic;
  }
}

/** An info or transform index points outside its target section */
export class UnresolvedReferenceError extends LvbError {
  readonly target: string;
  readonly index: number;
  readonly length: number;

  constructor(target: string, index: number, length: number, context: string) {
    super('UnresolvedReference', `${context}: index ${index} is outside ${target} (${length} entries)`);
    this.target = target;
    this.index = index;
    this.length = length;
  }
}

export class InvalidEncodingError extends LvbError {
  readonly offset: number;

  constructor(offset: number) {
    super('InvalidEncoding', `String at offset 0x${offset.toString(16)} is not valid UTF-8`);
    this.offset = offset;
  }
}

export class OffsetOutOfRangeError extends LvbError {
  readonly offset: number;

  constructor(offset: number, length: number, what = 'offset') {
    super('OffsetOutOfRange', `String ${what} at 0x${offset.toString(16)} is outside the string table (${length} bytes)`);
    this.offset = offset;
  }
}

export class NotFoundError extends LvbError {
  constructor(message: string) {
    super('NotFound', message);
  }
}
