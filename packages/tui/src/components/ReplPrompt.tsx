/**
 * ReplPrompt: draws the live prompt line from a `ReplView`.
 *
 * Pure rendering component. Editing state lives in the engine.
 */

import { Text } from "ink";
import type { ReplView } from "@replkit/core";
import { formatPromptLine, theme as defaultTheme, type Theme } from "../rendering/theme.js";

interface ReplPromptProps {
  view: ReplView;
  theme?: Theme;
}

export function ReplPrompt({ view, theme = defaultTheme }: ReplPromptProps) {
  return <Text>{formatPromptLine(view, theme)}</Text>;
}
