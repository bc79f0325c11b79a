// implode-decoder ships no type declarations and has no @types package.
declare module 'implode-decoder' {
  import { Transform } from 'node:stream';

  /** Transform stream that decodes PKWARE DCL imploded data. */
  class ImplodeDecoder extends Transform {
    constructor();
  }

  export = ImplodeDecoder;
}
