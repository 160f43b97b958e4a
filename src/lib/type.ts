export type Box = [number, number, number, number]; // [x1, y1, x2, y2]

export interface Detection {
  box: Box;
  label: string;
  score: number;
}

/** Decoded RGB pixels, 3 bytes per pixel, row major. */
export interface RawImage {
  data: Uint8Array;
  width: number;
  height: number;
}

export interface Detector {
  detect(image: RawImage, confidence: number): Detection[];
  dispose(): void;
}
