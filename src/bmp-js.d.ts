declare module "bmp-js" {
  namespace bmp {
    interface DecodedBitmap {
      width: number;
      height: number;
      bitPP: number;
      /** Four bytes per pixel: alpha, blue, green, red. */
      data: Buffer;
    }
  }

  const bmp: {
    decode(buffer: Buffer): bmp.DecodedBitmap;
  };

  export = bmp;
}
