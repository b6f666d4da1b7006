export { AsciiCanvas } from './AsciiCanvas';
export { renderDiagram, toScreenNodes } from './renderDiagram';
export type { RenderInput } from './renderDiagram';
export { textLayout, caretPosition, drawNode, drawLine } from './shapes';
export type { PlacedLine, TextLayout } from './shapes';
export { drawRoute, arrowGlyph } from './connectors';
export type { RouteStyle } from './connectors';
