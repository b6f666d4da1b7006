import { useInput } from 'ink';
import type { EditorEvent } from '../core/orchestration/types';
import type { EditorLayout } from '../components/terminal/layout';
import { toEditorEvents } from './terminalInput';

interface UseEditorInputProps {
  layout: EditorLayout;
  onEvents: (events: EditorEvent[]) => void;
  isActive?: boolean;
}

export const useEditorInput = ({ layout, onEvents, isActive = true }: UseEditorInputProps) => {
  useInput(
    (input, key) => {
      const events = toEditorEvents(input, key, layout);
      if (events.length > 0) onEvents(events);
    },
    { isActive }
  );
};
