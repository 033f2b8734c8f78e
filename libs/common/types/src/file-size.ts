/**
 * File Intake File Size
 * Immutable size value with a unit, normalised to bytes
 */

export enum FileSizeUnit {
  Byte = 'Byte',
  Kilobyte = 'Kilobyte',
  Megabyte = 'Megabyte',
  Gigabyte = 'Gigabyte',
}

const BYTES_PER_UNIT: Record<FileSizeUnit, number> = {
  [FileSizeUnit.Byte]: 1,
  [FileSizeUnit.Kilobyte]: 1024,
  [FileSizeUnit.Megabyte]: 1024 * 1024,
  [FileSizeUnit.Gigabyte]: 1024 * 1024 * 1024,
};

const UNIT_SUFFIXES = new Map<string, FileSizeUnit>([
  ['b', FileSizeUnit.Byte],
  ['kb', FileSizeUnit.Kilobyte],
  ['mb', FileSizeUnit.Megabyte],
  ['gb', FileSizeUnit.Gigabyte],
]);

export class FileSize {
  private constructor(
    readonly value: number,
    readonly unit: FileSizeUnit,
  ) {}

  static create(value: number, unit: FileSizeUnit): FileSize {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`File size must be a non-negative integer, got ${value}`);
    }
    return new FileSize(value, unit);
  }

  /**
   * Parse values such as "2MB", "512 kb" or "100B"
   */
  static parse(input: string): FileSize {
    const match = /^\s*(\d+)\s*([a-zA-Z]+)\s*$/.exec(input);
    const unit = match ? UNIT_SUFFIXES.get(match[2].toLowerCase()) : undefined;
    if (!match || !unit) {
      throw new RangeError(`Invalid file size: '${input}'`);
    }
    return FileSize.create(parseInt(match[1], 10), unit);
  }

  toBytes(): number {
    return this.value * BYTES_PER_UNIT[this.unit];
  }

  toString(): string {
    return `${this.value} ${this.unit}`;
  }
}
