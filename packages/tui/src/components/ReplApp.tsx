/**
 * ReplApp: the full REPL screen: printed output in Ink's `<Static>` region
 * above the live prompt.
 */

import { Box, Static, Text } from "ink";
import type { Executor, ReplRunner } from "@replkit/core";
import { useRepl } from "../hooks/use-repl.js";
import type { InkSurface } from "../ink-surface.js";
import type { Theme } from "../rendering/theme.js";
import { ReplPrompt } from "./ReplPrompt.js";

export interface ReplAppProps<Ctx extends Executor<Ctx>> {
  runner: ReplRunner<Ctx>;
  surface: InkSurface;
  theme?: Theme;
  onExit?: () => void;
}

export function ReplApp<Ctx extends Executor<Ctx>>({ runner, surface, theme, onExit }: ReplAppProps<Ctx>) {
  const { view, output } = useRepl({ runner, surface, onExit });

  return (
    <Box flexDirection="column">
      <Static items={[...output]}>{(line) => <Text key={line.id}>{line.text}</Text>}</Static>
      {view && <ReplPrompt view={view} theme={theme} />}
    </Box>
  );
}
