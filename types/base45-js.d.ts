// base45-js ships without type definitions
declare module 'base45-js' {
  export function encode(input: Uint8Array): string;
  export function decode(input: string): Buffer;
}
