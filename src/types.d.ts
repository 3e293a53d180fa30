declare module 'hypercore-crypto' {
  export function randomBytes(n: number): Buffer
  const crypto: { randomBytes: typeof randomBytes }
  export default crypto
}

declare module 'b4a' {
  export function toString(buf: Uint8Array, encoding?: string, start?: number, end?: number): string
  export function from(data: string | Uint8Array, encoding?: string): Buffer
  export function concat(buffers: Uint8Array[], totalLength?: number): Buffer
  export function alloc(size: number): Buffer
  export function byteLength(data: string | Uint8Array, encoding?: string): number
  const b4a: {
    toString: typeof toString
    from: typeof from
    concat: typeof concat
    alloc: typeof alloc
    byteLength: typeof byteLength
  }
  export default b4a
}
