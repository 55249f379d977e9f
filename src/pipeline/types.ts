export type AtomNode = { type: 'atom'; value: string };
export type StringNode = { type: 'string'; value: string };
export type ListNode = { type: 'list'; items: SNode[] };
export type SNode = AtomNode | StringNode | ListNode;

export type Token =
  | { type: 'open'; offset: number }
  | { type: 'close'; offset: number }
  | { type: 'string'; value: string; offset: number }
  | { type: 'atom'; value: string; offset: number };

// Rectangle in document units (mm for KiCad); x/y is the top-left corner.
export type Region = {
  readonly label: string;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
};

// [minX, minY, width, height]
export type ViewBox = [number, number, number, number];

export type PhysicalUnit = 'mm' | 'cm' | 'in';

export type CropRequest = {
  label: string;
  fileName: string;
  viewBox: ViewBox;
  width: number;
  height: number;
  unit: PhysicalUnit;
  svg: string;
  supersample: number;
};

export interface Rasterizer {
  rasterize(request: CropRequest): Promise<string>;
}

export type CropResult = {
  label: string;
  request: CropRequest;
  output: string;
};
