// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { PaintPath, PathCommand, Rect } from '../types';
import type { Canvas2DContext } from '../internalTypes';

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Fluent builder of {@link PaintPath}.
 */
export interface PathBuilder {
  readonly moveTo: (x: number, y: number) => PathBuilder;
  readonly lineTo: (x: number, y: number) => PathBuilder;
  readonly quadraticCurveTo: (
    cpx: number,
    cpy: number,
    x: number,
    y: number
  ) => PathBuilder;
  readonly bezierCurveTo: (
    cp1x: number,
    cp1y: number,
    cp2x: number,
    cp2y: number,
    x: number,
    y: number
  ) => PathBuilder;
  readonly rect: (rect: Rect) => PathBuilder;
  readonly ellipse: (
    x: number,
    y: number,
    radiusX: number,
    radiusY: number
  ) => PathBuilder;
  readonly closePath: () => PathBuilder;
  /** Snapshot of the commands added so far. */
  readonly build: () => PaintPath;
}

/**
 * Creates a path builder.
 * @returns Path builder.
 */
export const createPathBuilder = (): PathBuilder => {
  const commands: PathCommand[] = [];

  const builder: PathBuilder = {
    moveTo: (x, y) => {
      commands.push({ type: 'moveTo', x, y });
      return builder;
    },
    lineTo: (x, y) => {
      commands.push({ type: 'lineTo', x, y });
      return builder;
    },
    quadraticCurveTo: (cpx, cpy, x, y) => {
      commands.push({ type: 'quadraticCurveTo', cpx, cpy, x, y });
      return builder;
    },
    bezierCurveTo: (cp1x, cp1y, cp2x, cp2y, x, y) => {
      commands.push({ type: 'bezierCurveTo', cp1x, cp1y, cp2x, cp2y, x, y });
      return builder;
    },
    rect: (rect) => {
      commands.push({ type: 'rect', rect });
      return builder;
    },
    ellipse: (x, y, radiusX, radiusY) => {
      commands.push({ type: 'ellipse', x, y, radiusX, radiusY });
      return builder;
    },
    closePath: () => {
      commands.push({ type: 'closePath' });
      return builder;
    },
    build: () => ({ commands: commands.slice() }),
  };

  return builder;
};

/**
 * Path enclosing a rectangle.
 */
export const createRectPath = (rect: Rect): PaintPath =>
  createPathBuilder().rect(rect).build();

/**
 * Replays a path into the current path of a 2D context.
 * @param ctx Target context; its current path is replaced.
 * @param path Path to trace.
 */
export const tracePath = (ctx: Canvas2DContext, path: PaintPath): void => {
  ctx.beginPath();
  for (const command of path.commands) {
    switch (command.type) {
      case 'moveTo':
        ctx.moveTo(command.x, command.y);
        break;
      case 'lineTo':
        ctx.lineTo(command.x, command.y);
        break;
      case 'quadraticCurveTo':
        ctx.quadraticCurveTo(command.cpx, command.cpy, command.x, command.y);
        break;
      case 'bezierCurveTo':
        ctx.bezierCurveTo(
          command.cp1x,
          command.cp1y,
          command.cp2x,
          command.cp2y,
          command.x,
          command.y
        );
        break;
      case 'rect':
        ctx.rect(
          command.rect.left,
          command.rect.top,
          command.rect.width,
          command.rect.height
        );
        break;
      case 'ellipse':
        ctx.moveTo(command.x + command.radiusX, command.y);
        ctx.ellipse(
          command.x,
          command.y,
          command.radiusX,
          command.radiusY,
          0,
          0,
          Math.PI * 2
        );
        break;
      case 'closePath':
        ctx.closePath();
        break;
    }
  }
};
