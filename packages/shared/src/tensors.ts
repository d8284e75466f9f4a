/**
 * Tensor element types, typed-array storage and base64 transport encoding.
 *
 * Data is always little-endian; typed arrays are created on fresh buffers so
 * their byte offset is zero and aligned for every element width.
 */

import {
  createInvalidCalibrationDataError,
  createUnsupportedTensorTypeError,
} from '@npu-latency/errors'

export const TENSOR_ELEMENT_TYPES = [
  'float',
  'float16',
  'double',
  'int8',
  'uint8',
  'int16',
  'uint16',
  'int32',
  'uint32',
  'int64',
  'uint64',
  'bool',
] as const

export type TensorElementType = (typeof TENSOR_ELEMENT_TYPES)[number]

export type TensorData =
  | Float32Array
  | Float64Array
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | BigInt64Array
  | BigUint64Array

/** Declared model input as reported by the toolchain */
export interface TensorInfo {
  name: string
  /** Element type, either bare (`float`) or wrapped (`tensor(float)`) */
  type: string
  /** Dimensions; zero or negative marks a dynamic dimension */
  shape: number[]
}

export interface Tensor {
  type: TensorElementType
  dims: number[]
  data: TensorData
}

interface ElementCodec {
  bytesPerElement: number
  allocate(length: number, fill: number): TensorData
  view(buffer: ArrayBuffer, length: number): TensorData
}

const TYPE_ALIASES: Record<string, TensorElementType> = {
  float32: 'float',
  float64: 'double',
}

const float32Scratch = new Float32Array(1)
const uint32Scratch = new Uint32Array(float32Scratch.buffer)

/**
 * IEEE 754 half-precision bits for a number, rounding half up on the
 * dropped mantissa bits.
 */
export function toFloat16Bits(value: number): number {
  float32Scratch[0] = value
  const bits = uint32Scratch[0]

  const sign = (bits >>> 16) & 0x8000
  const rawExponent = (bits >>> 23) & 0xff
  let mantissa = bits & 0x7fffff

  if (rawExponent === 0xff) {
    return sign | 0x7c00 | (mantissa ? 0x200 : 0)
  }

  const exponent = rawExponent - 127 + 15
  if (exponent >= 0x1f) {
    return sign | 0x7c00
  }

  if (exponent <= 0) {
    if (exponent < -10) {
      return sign
    }
    mantissa |= 0x800000
    const shift = 14 - exponent
    const half = mantissa >>> shift
    const roundBit = 1 << (shift - 1)
    return sign | (half + (mantissa & roundBit ? 1 : 0))
  }

  const half = sign | (exponent << 10) | (mantissa >>> 13)
  return half + (mantissa & 0x1000 ? 1 : 0)
}

const ELEMENT_CODECS: Record<TensorElementType, ElementCodec> = {
  float: {
    bytesPerElement: 4,
    allocate: (n, fill) => new Float32Array(n).fill(fill),
    view: (buffer, n) => new Float32Array(buffer, 0, n),
  },
  float16: {
    bytesPerElement: 2,
    allocate: (n, fill) => new Uint16Array(n).fill(toFloat16Bits(fill)),
    view: (buffer, n) => new Uint16Array(buffer, 0, n),
  },
  double: {
    bytesPerElement: 8,
    allocate: (n, fill) => new Float64Array(n).fill(fill),
    view: (buffer, n) => new Float64Array(buffer, 0, n),
  },
  int8: {
    bytesPerElement: 1,
    allocate: (n, fill) => new Int8Array(n).fill(fill),
    view: (buffer, n) => new Int8Array(buffer, 0, n),
  },
  uint8: {
    bytesPerElement: 1,
    allocate: (n, fill) => new Uint8Array(n).fill(fill),
    view: (buffer, n) => new Uint8Array(buffer, 0, n),
  },
  int16: {
    bytesPerElement: 2,
    allocate: (n, fill) => new Int16Array(n).fill(fill),
    view: (buffer, n) => new Int16Array(buffer, 0, n),
  },
  uint16: {
    bytesPerElement: 2,
    allocate: (n, fill) => new Uint16Array(n).fill(fill),
    view: (buffer, n) => new Uint16Array(buffer, 0, n),
  },
  int32: {
    bytesPerElement: 4,
    allocate: (n, fill) => new Int32Array(n).fill(fill),
    view: (buffer, n) => new Int32Array(buffer, 0, n),
  },
  uint32: {
    bytesPerElement: 4,
    allocate: (n, fill) => new Uint32Array(n).fill(fill),
    view: (buffer, n) => new Uint32Array(buffer, 0, n),
  },
  int64: {
    bytesPerElement: 8,
    allocate: (n, fill) => new BigInt64Array(n).fill(BigInt(Math.trunc(fill))),
    view: (buffer, n) => new BigInt64Array(buffer, 0, n),
  },
  uint64: {
    bytesPerElement: 8,
    allocate: (n, fill) => new BigUint64Array(n).fill(BigInt(Math.trunc(fill))),
    view: (buffer, n) => new BigUint64Array(buffer, 0, n),
  },
  bool: {
    bytesPerElement: 1,
    allocate: (n, fill) => new Uint8Array(n).fill(fill !== 0 ? 1 : 0),
    view: (buffer, n) => new Uint8Array(buffer, 0, n),
  },
}

/**
 * Normalize `tensor(float)`, `float` or `float32` to an element type.
 * Throws UNSUPPORTED_TENSOR_TYPE for anything else.
 */
export function parseTensorType(type: string): TensorElementType {
  const trimmed = type.trim()
  const match = /^tensor\((.+)\)$/.exec(trimmed)
  const name = match ? match[1] : trimmed

  const resolved = TYPE_ALIASES[name] ?? TENSOR_ELEMENT_TYPES.find((known) => known === name)
  if (!resolved) {
    throw createUnsupportedTensorTypeError(type)
  }
  return resolved
}

/** Dynamic dimensions (zero or negative) are fixed at 1 */
export function materializeShape(shape: number[]): number[] {
  return shape.map((dim) => (dim > 0 ? dim : 1))
}

export function elementCount(dims: number[]): number {
  return dims.reduce((count, dim) => count * dim, 1)
}

/**
 * Tensor for a declared input with every element set to `fill`
 */
export function createFilledTensor(info: TensorInfo, fill: number): Tensor {
  const type = parseTensorType(info.type)
  const dims = materializeShape(info.shape)
  return {
    type,
    dims,
    data: ELEMENT_CODECS[type].allocate(elementCount(dims), fill),
  }
}

export function encodeTensorData(data: TensorData): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64')
}

/**
 * Decode base64 little-endian bytes into a tensor, checking the byte count
 * against the dims.
 */
export function decodeTensor(
  name: string,
  type: string,
  dims: number[],
  base64: string
): Tensor {
  const elementType = parseTensorType(type)
  const codec = ELEMENT_CODECS[elementType]
  const count = elementCount(dims)
  const expectedBytes = count * codec.bytesPerElement

  const decoded = Buffer.from(base64, 'base64')
  if (decoded.byteLength !== expectedBytes) {
    throw createInvalidCalibrationDataError(
      `Tensor '${name}' holds ${decoded.byteLength} bytes, expected ${expectedBytes}`,
      { details: { tensor: name, type: elementType, dims } }
    )
  }

  const buffer = new ArrayBuffer(expectedBytes)
  new Uint8Array(buffer).set(decoded)

  return { type: elementType, dims: [...dims], data: codec.view(buffer, count) }
}

/**
 * Plain numbers for inspection and logging; 64-bit integers become numbers
 * and lose precision beyond 2^53.
 */
export function tensorValues(tensor: Tensor): number[] {
  const values: number[] = []
  for (const value of tensor.data) {
    values.push(Number(value))
  }
  return values
}
