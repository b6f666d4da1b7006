import type { Route } from '../../domain/geometry';
import type { AsciiCanvas } from './AsciiCanvas';

export interface RouteStyle {
  arrow: boolean;
  /** Selected or in-progress connectors use the double-stroke glyphs */
  highlighted: boolean;
}

function span(a: number, b: number): number[] {
  const cells: number[] = [];
  for (let v = Math.min(a, b); v <= Math.max(a, b); v++) {
    cells.push(v);
  }
  return cells;
}

/** Arrowhead pointing along the last non-empty segment of the route */
export function arrowGlyph(route: Route): string {
  const { start, end, mid } = route;
  const vertical = () => (start.y < end.y ? 'v' : '^');
  const horizontal = () => (start.x < end.x ? '>' : '<');

  if (route.orientation === 'vertical-first') {
    return end.y !== mid ? vertical() : horizontal();
  }
  return end.x !== mid ? horizontal() : vertical();
}

export function drawRoute(canvas: AsciiCanvas, route: Route, style: RouteStyle): void {
  const horiz = style.highlighted ? '=' : '-';
  const vert = style.highlighted ? '#' : '|';
  const join = style.highlighted ? '#' : '+';
  const terminator = style.highlighted ? '@' : 'o';
  const { start, end, mid } = route;

  if (route.orientation === 'vertical-first') {
    span(start.y, mid).forEach(y => canvas.set(start.x, y, vert));
    span(start.x, end.x).forEach(x => canvas.set(x, mid, horiz));
    span(mid, end.y).forEach(y => canvas.set(end.x, y, vert));
    if (start.x !== end.x) {
      canvas.set(start.x, mid, join);
      canvas.set(end.x, mid, join);
    }
  } else {
    span(start.x, mid).forEach(x => canvas.set(x, start.y, horiz));
    span(start.y, end.y).forEach(y => canvas.set(mid, y, vert));
    span(mid, end.x).forEach(x => canvas.set(x, end.y, horiz));
    if (start.y !== end.y) {
      canvas.set(mid, start.y, join);
      canvas.set(mid, end.y, join);
    }
  }

  canvas.set(start.x, start.y, terminator);
  canvas.set(end.x, end.y, style.arrow ? arrowGlyph(route) : terminator);
}
