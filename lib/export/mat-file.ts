// MATLAB level-5 MAT-file reader and writer
// Covers the classes the exporters need: double, char, cell and struct

import { inflate } from 'pako';
import { MatFileError } from '../errors';

export type MatValue =
  | { kind: 'numeric'; dims: number[]; data: Float64Array }
  | { kind: 'char'; dims: number[]; text: string }
  | { kind: 'cell'; dims: number[]; cells: MatValue[] }
  | { kind: 'struct'; dims: number[]; fieldNames: string[]; elements: Array<Record<string, MatValue>> };

export type MatVariables = Record<string, MatValue>;

// Data element types
const miINT8 = 1;
const miUINT8 = 2;
const miINT16 = 3;
const miUINT16 = 4;
const miINT32 = 5;
const miUINT32 = 6;
const miSINGLE = 7;
const miDOUBLE = 9;
const miINT64 = 12;
const miUINT64 = 13;
const miMATRIX = 14;
const miCOMPRESSED = 15;
const miUTF8 = 16;
const miUTF16 = 17;

// Array classes
const mxCELL_CLASS = 1;
const mxSTRUCT_CLASS = 2;
const mxCHAR_CLASS = 4;
const mxDOUBLE_CLASS = 6;
const mxUINT64_CLASS = 15;

const HEADER_BYTES = 128;
const HEADER_TEXT_BYTES = 116;
const FIELD_NAME_LENGTH = 32;
const FLAG_COMPLEX = 0x08;

export const DEFAULT_HEADER_TEXT = 'MATLAB 5.0 MAT-file, Platform: GLNXA64, written by emg-session-viewer';

// ---------------------------------------------------------------------------
// Value builders and accessors
// ---------------------------------------------------------------------------

export function matNumeric(values: ArrayLike<number>, dims?: number[]): MatValue {
  const data = Float64Array.from(values);
  const shape = dims ?? (data.length === 0 ? [0, 0] : [1, data.length]);
  if (product(shape) !== data.length) {
    throw new MatFileError(`Dimensions [${shape.join(', ')}] do not match ${data.length} values`);
  }
  return { kind: 'numeric', dims: shape, data };
}

export function matScalar(value: number | null | undefined): MatValue {
  return value === null || value === undefined ? matNumeric([]) : matNumeric([value]);
}

export function matString(text: string): MatValue {
  return { kind: 'char', dims: text.length === 0 ? [0, 0] : [1, text.length], text };
}

export function matCell(cells: MatValue[]): MatValue {
  return { kind: 'cell', dims: [1, cells.length], cells };
}

export function matStruct(elements: Array<Record<string, MatValue>>, fieldNames?: string[]): MatValue {
  const names = fieldNames ?? (elements.length > 0 ? Object.keys(elements[0]) : []);
  for (const name of names) {
    if (name.length === 0 || name.length >= FIELD_NAME_LENGTH) {
      throw new MatFileError(`Invalid struct field name "${name}"`);
    }
  }
  return { kind: 'struct', dims: [1, elements.length], fieldNames: names, elements };
}

function product(dims: readonly number[]): number {
  return dims.reduce((acc, d) => acc * d, 1);
}

function describe(value: MatValue | undefined): string {
  return value ? `${value.kind} [${value.dims.join('x')}]` : 'missing value';
}

export function asNumbers(value: MatValue | undefined, what = 'value'): number[] {
  if (value?.kind !== 'numeric') {
    throw new MatFileError(`Expected numeric ${what}, found ${describe(value)}`);
  }
  return Array.from(value.data);
}

export function asString(value: MatValue | undefined, what = 'value'): string {
  if (value?.kind !== 'char') {
    throw new MatFileError(`Expected text ${what}, found ${describe(value)}`);
  }
  return value.text;
}

export function asCells(value: MatValue | undefined, what = 'value'): MatValue[] {
  if (value?.kind !== 'cell') {
    throw new MatFileError(`Expected cell array ${what}, found ${describe(value)}`);
  }
  return value.cells;
}

export function asStructElements(
  value: MatValue | undefined,
  what = 'value'
): Array<Record<string, MatValue>> {
  if (value?.kind !== 'struct') {
    throw new MatFileError(`Expected struct ${what}, found ${describe(value)}`);
  }
  return value.elements;
}

/**
 * Plain JS view of a value: a scalar, a string, a numeric vector, a list for
 * cells, or objects for struct elements.
 */
export function unwrapMatValue(value: MatValue): unknown {
  switch (value.kind) {
    case 'numeric':
      return value.data.length === 1 ? value.data[0] : Array.from(value.data);
    case 'char':
      return value.text;
    case 'cell':
      return value.cells.map(unwrapMatValue);
    case 'struct':
      return value.elements.map((element) =>
        Object.fromEntries(Object.entries(element).map(([k, v]) => [k, unwrapMatValue(v)]))
      );
  }
}

// ---------------------------------------------------------------------------
// Writer
// ---------------------------------------------------------------------------

class ByteWriter {
  private buffer = new Uint8Array(1024);
  private view = new DataView(this.buffer.buffer);
  length = 0;

  private ensure(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.buffer.length) return;
    let size = this.buffer.length * 2;
    while (size < needed) size *= 2;
    const next = new Uint8Array(size);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }

  uint8(value: number): void {
    this.ensure(1);
    this.view.setUint8(this.length, value);
    this.length += 1;
  }

  uint16(value: number): void {
    this.ensure(2);
    this.view.setUint16(this.length, value, true);
    this.length += 2;
  }

  uint32(value: number): void {
    this.ensure(4);
    this.view.setUint32(this.length, value, true);
    this.length += 4;
  }

  int32(value: number): void {
    this.ensure(4);
    this.view.setInt32(this.length, value, true);
    this.length += 4;
  }

  float64(value: number): void {
    this.ensure(8);
    this.view.setFloat64(this.length, value, true);
    this.length += 8;
  }

  bytes(data: Uint8Array): void {
    this.ensure(data.length);
    this.buffer.set(data, this.length);
    this.length += data.length;
  }

  padTo8(): void {
    while (this.length % 8 !== 0) this.uint8(0);
  }

  patchUint32(offset: number, value: number): void {
    this.view.setUint32(offset, value, true);
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}

function writeElement(w: ByteWriter, type: number, byteCount: number, body: () => void): void {
  w.uint32(type);
  w.uint32(byteCount);
  body();
  w.padTo8();
}

function writeMatrix(w: ByteWriter, name: string, value: MatValue): void {
  w.uint32(miMATRIX);
  const sizeOffset = w.length;
  w.uint32(0);
  const start = w.length;

  const arrayClass =
    value.kind === 'numeric'
      ? mxDOUBLE_CLASS
      : value.kind === 'char'
        ? mxCHAR_CLASS
        : value.kind === 'cell'
          ? mxCELL_CLASS
          : mxSTRUCT_CLASS;

  writeElement(w, miUINT32, 8, () => {
    w.uint32(arrayClass);
    w.uint32(0);
  });

  writeElement(w, miINT32, value.dims.length * 4, () => {
    value.dims.forEach((d) => w.int32(d));
  });

  const nameBytes = new TextEncoder().encode(name);
  writeElement(w, miINT8, nameBytes.length, () => w.bytes(nameBytes));

  switch (value.kind) {
    case 'numeric':
      writeElement(w, miDOUBLE, value.data.length * 8, () => {
        value.data.forEach((v) => w.float64(v));
      });
      break;
    case 'char':
      writeElement(w, miUINT16, value.text.length * 2, () => {
        for (let i = 0; i < value.text.length; i++) {
          w.uint16(value.text.charCodeAt(i));
        }
      });
      break;
    case 'cell':
      value.cells.forEach((cell) => writeMatrix(w, '', cell));
      break;
    case 'struct': {
      writeElement(w, miINT32, 4, () => w.int32(FIELD_NAME_LENGTH));
      const names = new Uint8Array(value.fieldNames.length * FIELD_NAME_LENGTH);
      value.fieldNames.forEach((field, i) => {
        names.set(new TextEncoder().encode(field), i * FIELD_NAME_LENGTH);
      });
      writeElement(w, miINT8, names.length, () => w.bytes(names));
      for (const element of value.elements) {
        for (const field of value.fieldNames) {
          writeMatrix(w, '', element[field] ?? matNumeric([]));
        }
      }
      break;
    }
  }

  w.patchUint32(sizeOffset, w.length - start);
}

/**
 * Serialize variables into an uncompressed, little-endian level-5 MAT-file.
 * Output depends only on the variables and the header text.
 */
export function writeMatFile(variables: MatVariables, headerText = DEFAULT_HEADER_TEXT): Uint8Array {
  const w = new ByteWriter();

  const text = new TextEncoder().encode(headerText.slice(0, HEADER_TEXT_BYTES));
  const header = new Uint8Array(HEADER_TEXT_BYTES).fill(0x20);
  header.set(text);
  w.bytes(header);
  w.bytes(new Uint8Array(8)); // subsystem data offset
  w.uint16(0x0100);
  w.uint8(0x49); // 'I'
  w.uint8(0x4d); // 'M'

  for (const [name, value] of Object.entries(variables)) {
    writeMatrix(w, name, value);
  }

  return w.toBytes();
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

interface ElementTag {
  type: number;
  byteCount: number;
  dataOffset: number;
  nextOffset: number;
}

class ByteReader {
  readonly view: DataView;

  constructor(
    readonly bytes: Uint8Array,
    readonly littleEndian: boolean
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  tag(offset: number): ElementTag {
    if (offset + 8 > this.bytes.length) {
      throw new MatFileError(`Truncated data element at byte ${offset}`);
    }
    const word = this.view.getUint32(offset, this.littleEndian);
    const small = word >>> 16;

    if (small !== 0) {
      // Small data element: up to 4 bytes packed next to the tag
      if (small > 4) {
        throw new MatFileError(`Small data element at byte ${offset} claims ${small} bytes`);
      }
      return { type: word & 0xffff, byteCount: small, dataOffset: offset + 4, nextOffset: offset + 8 };
    }

    const byteCount = this.view.getUint32(offset + 4, this.littleEndian);
    const dataOffset = offset + 8;
    if (dataOffset + byteCount > this.bytes.length) {
      throw new MatFileError(`Data element at byte ${offset} runs past the end of the file`);
    }
    return {
      type: word,
      byteCount,
      dataOffset,
      nextOffset: word === miCOMPRESSED ? dataOffset + byteCount : dataOffset + align8(byteCount),
    };
  }

  numbers(tag: ElementTag): number[] {
    const { type, byteCount, dataOffset } = tag;
    const size = elementSize(type);
    if (byteCount % size !== 0) {
      throw new MatFileError(`Data element of type ${type} has ${byteCount} bytes, not a multiple of ${size}`);
    }
    const count = byteCount / size;
    const out: number[] = new Array(count);

    for (let i = 0; i < count; i++) {
      const at = dataOffset + i * size;
      out[i] = this.numberAt(type, at);
    }
    return out;
  }

  private numberAt(type: number, at: number): number {
    const le = this.littleEndian;
    switch (type) {
      case miINT8:
        return this.view.getInt8(at);
      case miUINT8:
      case miUTF8:
        return this.view.getUint8(at);
      case miINT16:
        return this.view.getInt16(at, le);
      case miUINT16:
      case miUTF16:
        return this.view.getUint16(at, le);
      case miINT32:
        return this.view.getInt32(at, le);
      case miUINT32:
        return this.view.getUint32(at, le);
      case miSINGLE:
        return this.view.getFloat32(at, le);
      case miDOUBLE:
        return this.view.getFloat64(at, le);
      case miINT64:
        return Number(this.view.getBigInt64(at, le));
      case miUINT64:
        return Number(this.view.getBigUint64(at, le));
      default:
        throw new MatFileError(`Unsupported numeric data type ${type}`);
    }
  }

  text(tag: ElementTag): string {
    const raw = this.bytes.subarray(tag.dataOffset, tag.dataOffset + tag.byteCount);
    if (tag.type === miUTF8 || tag.type === miUINT8 || tag.type === miINT8) {
      return new TextDecoder('utf-8').decode(raw);
    }
    const codes = this.numbers(tag);
    let text = '';
    for (let i = 0; i < codes.length; i += CHAR_CHUNK) {
      text += String.fromCharCode(...codes.slice(i, i + CHAR_CHUNK));
    }
    return text;
  }
}

// Bounds the argument count of a single fromCharCode call
const CHAR_CHUNK = 8192;

function align8(n: number): number {
  return Math.ceil(n / 8) * 8;
}

function elementSize(type: number): number {
  switch (type) {
    case miINT8:
    case miUINT8:
    case miUTF8:
      return 1;
    case miINT16:
    case miUINT16:
    case miUTF16:
      return 2;
    case miINT32:
    case miUINT32:
    case miSINGLE:
      return 4;
    case miDOUBLE:
    case miINT64:
    case miUINT64:
      return 8;
    default:
      throw new MatFileError(`Unsupported numeric data type ${type}`);
  }
}

function readMatrix(r: ByteReader, tag: ElementTag): { name: string; value: MatValue } {
  const end = tag.dataOffset + tag.byteCount;
  if (tag.byteCount === 0) {
    return { name: '', value: matNumeric([]) };
  }

  const flagsTag = r.tag(tag.dataOffset);
  const flagsWord = r.numbers(flagsTag)[0];
  const arrayClass = flagsWord & 0xff;
  const isComplex = ((flagsWord >> 8) & 0xff & FLAG_COMPLEX) !== 0;

  const dimsTag = r.tag(flagsTag.nextOffset);
  const dims = r.numbers(dimsTag);

  const nameTag = r.tag(dimsTag.nextOffset);
  const name = r.text(nameTag);

  let offset = nameTag.nextOffset;
  const count = product(dims);

  if (arrayClass === mxCELL_CLASS) {
    const cells: MatValue[] = [];
    for (let i = 0; i < count; i++) {
      const cellTag = r.tag(offset);
      cells.push(readMatrix(r, cellTag).value);
      offset = cellTag.nextOffset;
    }
    return { name, value: { kind: 'cell', dims, cells } };
  }

  if (arrayClass === mxSTRUCT_CLASS) {
    const lengthTag = r.tag(offset);
    const fieldNameLength = r.numbers(lengthTag)[0];
    const namesTag = r.tag(lengthTag.nextOffset);
    const fieldCount = fieldNameLength > 0 ? namesTag.byteCount / fieldNameLength : 0;
    const fieldNames: string[] = [];
    for (let i = 0; i < fieldCount; i++) {
      const at = namesTag.dataOffset + i * fieldNameLength;
      const raw = r.bytes.subarray(at, at + fieldNameLength);
      const nul = raw.indexOf(0);
      fieldNames.push(new TextDecoder('ascii').decode(nul >= 0 ? raw.subarray(0, nul) : raw));
    }
    offset = namesTag.nextOffset;

    const elements: Array<Record<string, MatValue>> = [];
    for (let i = 0; i < count; i++) {
      const element: Record<string, MatValue> = {};
      for (const field of fieldNames) {
        const fieldTag = r.tag(offset);
        element[field] = readMatrix(r, fieldTag).value;
        offset = fieldTag.nextOffset;
      }
      elements.push(element);
    }
    return { name, value: { kind: 'struct', dims, fieldNames, elements } };
  }

  if (arrayClass === mxCHAR_CLASS) {
    if (offset >= end) {
      return { name, value: { kind: 'char', dims, text: '' } };
    }
    const dataTag = r.tag(offset);
    const units = r.text(dataTag);
    return { name, value: { kind: 'char', dims, text: columnMajorText(units, dims) } };
  }

  if (arrayClass >= mxDOUBLE_CLASS && arrayClass <= mxUINT64_CLASS) {
    if (isComplex) {
      throw new MatFileError(`Variable "${name}" is complex, which is not supported`);
    }
    const data = offset < end ? r.numbers(r.tag(offset)) : [];
    if (data.length !== count) {
      throw new MatFileError(`Variable "${name}" has ${data.length} values for dimensions [${dims.join(', ')}]`);
    }
    return { name, value: { kind: 'numeric', dims, data: Float64Array.from(data) } };
  }

  throw new MatFileError(`Variable "${name}" uses unsupported array class ${arrayClass}`);
}

// Char matrices are stored column-major; rows are joined with newlines
function columnMajorText(units: string, dims: number[]): string {
  const rows = dims[0] ?? 0;
  const cols = dims.length > 1 ? product(dims.slice(1)) : 1;
  if (rows <= 1) return units;

  const lines: string[] = [];
  for (let row = 0; row < rows; row++) {
    let line = '';
    for (let col = 0; col < cols; col++) {
      line += units.charAt(col * rows + row);
    }
    lines.push(line);
  }
  return lines.join('\n');
}

function readElements(r: ByteReader, start: number, into: MatVariables): void {
  let offset = start;

  while (offset + 8 <= r.bytes.length) {
    const tag = r.tag(offset);

    if (tag.type === miCOMPRESSED) {
      let inflated: Uint8Array;
      try {
        inflated = inflate(r.bytes.subarray(tag.dataOffset, tag.dataOffset + tag.byteCount));
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new MatFileError(`Could not inflate compressed element at byte ${offset}: ${reason}`);
      }
      readElements(new ByteReader(inflated, r.littleEndian), 0, into);
    } else if (tag.type === miMATRIX) {
      const { name, value } = readMatrix(r, tag);
      into[name] = value;
    } else {
      console.warn(`[MAT Reader] Skipping top-level element of type ${tag.type}`);
    }

    offset = tag.nextOffset;
  }
}

/**
 * Parse a level-5 MAT-file into its named variables.
 */
export function readMatFile(bytes: Uint8Array): MatVariables {
  if (bytes.length < HEADER_BYTES) {
    throw new MatFileError('File is too small to be a MAT-file');
  }

  const indicator = String.fromCharCode(bytes[126], bytes[127]);
  let littleEndian: boolean;
  if (indicator === 'IM') {
    littleEndian = true;
  } else if (indicator === 'MI') {
    littleEndian = false;
  } else {
    throw new MatFileError('Missing MAT-file endian indicator; only level-5 files are supported');
  }

  const variables: MatVariables = {};
  readElements(new ByteReader(bytes, littleEndian), HEADER_BYTES, variables);
  return variables;
}

/**
 * Header text of a MAT-file, without trailing padding.
 */
export function readMatHeaderText(bytes: Uint8Array): string {
  return new TextDecoder('ascii').decode(bytes.subarray(0, HEADER_TEXT_BYTES)).trimEnd();
}
