/**
 * Terminal editor shell
 *
 * Owns the single EditorState of the session. Input is decoded into editor events, each
 * event is applied by the Orchestrator, and the returned effects are run here. The view
 * is re-rendered from the state after every batch.
 */

import React, { useCallback, useEffect, useRef, useState } from "react";
import { Box, useApp, useStdout } from "ink";
import type { EditorState } from "../core/orchestration/state/EditorState";
import type { ApplyContext, EditorEffect, EditorEvent } from "../core/orchestration/types";
import { apply } from "../core/orchestration/Orchestrator";
import { renderView } from "../core/orchestration/render/Renderer";
import { caretPosition, toScreenNodes } from "../core/renderer";
import { findNode } from "../domain";
import type { EffectRunnerDeps } from "../services/effectRunner";
import { runEffect } from "../services/effectRunner";
import { useEditorInput } from "../hooks/useEditorInput";
import type { TerminalSize } from "./terminal/layout";
import { computeLayout } from "./terminal/layout";
import { drawModeOverlay } from "./terminal/overlays";
import CanvasFrame from "./terminal/CanvasFrame";
import StatusBar, { MODE_STYLES } from "./terminal/StatusBar";

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };

export interface EditorAppProps {
  initialState: EditorState;
  directory: string;
  exportWidth: number;
  /** Replaces parts of the effect runner (clipboard, file writes) */
  effects?: Partial<Omit<EffectRunnerDeps, "directory" | "exit">>;
  size?: TerminalSize;
}

function caretCell(state: EditorState, context: ApplyContext) {
  if (state.mode.kind !== "insert") return null;
  const node = findNode(state.nodes, state.mode.nodeId);
  if (!node) return null;
  const [screenNode] = toScreenNodes([node], state.cameraOffset);
  const caret = caretPosition(screenNode);
  const { width, height } = context.viewport;
  if (caret.x < 0 || caret.y < 0 || caret.x >= width || caret.y >= height) return null;
  return caret;
}

export default function EditorApp({ initialState, directory, exportWidth, effects, size }: EditorAppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const stateRef = useRef(initialState);
  const [, setRevision] = useState(0);
  const rerender = useCallback(() => setRevision(r => r + 1), []);

  const readSize = useCallback(
    (): TerminalSize => size ?? { columns: stdout?.columns ?? FALLBACK_SIZE.columns, rows: stdout?.rows ?? FALLBACK_SIZE.rows },
    [size, stdout]
  );
  const [terminalSize, setTerminalSize] = useState<TerminalSize>(readSize);

  useEffect(() => {
    if (!stdout || size) return undefined;
    const onResize = () => setTerminalSize(readSize());
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout, size, readSize]);

  const layout = computeLayout(terminalSize, exportWidth);
  const context: ApplyContext = { viewport: layout.viewport, exportWidth };
  const contextRef = useRef(context);
  contextRef.current = context;

  const runEffects = useCallback(
    (pending: EditorEffect[]) => {
      for (const effect of pending) {
        runEffect(effect, { ...effects, directory, exit })
          .then(message => {
            if (message === null) return;
            stateRef.current.statusMessage = message;
            rerender();
          })
          .catch(error => {
            console.error("[EditorApp] Effect failed:", error);
          });
      }
    },
    [effects, directory, exit, rerender]
  );

  const onEvents = useCallback(
    (events: EditorEvent[]) => {
      const state = stateRef.current;
      for (const event of events) {
        runEffects(apply(state, event, contextRef.current));
      }
      rerender();
    },
    [runEffects, rerender]
  );

  useEditorInput({ layout, onEvents });

  const state = stateRef.current;
  const canvas = drawModeOverlay(renderView(state, layout.viewport), state.mode, state.title, layout.viewport);
  const modeColor = MODE_STYLES[state.mode.kind].color;

  return (
    <Box flexDirection="column" marginLeft={layout.marginLeft}>
      <CanvasFrame
        title={state.title}
        rows={canvas.lines()}
        width={layout.frameWidth}
        color={modeColor}
        caret={caretCell(state, context)}
      />
      <StatusBar mode={state.mode.kind} message={state.statusMessage} width={layout.frameWidth} />
    </Box>
  );
}
