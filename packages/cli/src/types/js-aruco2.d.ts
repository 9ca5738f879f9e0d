declare module 'js-aruco2' {
  interface MarkerCorner {
    x: number;
    y: number;
  }

  interface DetectedMarker {
    id: number;
    corners: MarkerCorner[];
    hammingDistance: number;
  }

  interface DetectorConfig {
    dictionaryName?: string;
    maxHammingDistance?: number;
  }

  interface ImageLike {
    width: number;
    height: number;
    data: Uint8ClampedArray;
  }

  interface DictionaryDefinition {
    nBits: number;
    tau?: number;
    codeList: Array<number | string>;
  }

  class Detector {
    constructor(config?: DetectorConfig);
    detect(image: ImageLike): DetectedMarker[];
  }

  class Dictionary {
    constructor(dicName: string);
    generateSVG(id: number): string;
  }

  export const AR: {
    Detector: typeof Detector;
    Dictionary: typeof Dictionary;
    DICTIONARIES: Record<string, DictionaryDefinition>;
  };
}
