declare module 'compressjs' {
  interface Algorithm {
    compressFile(input: Uint8Array | number[]): Uint8Array;
    decompressFile(input: Uint8Array | number[]): Uint8Array;
  }

  const compressjs: {
    Bzip2: Algorithm;
  };

  export default compressjs;
}
