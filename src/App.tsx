import { useState, useEffect, useCallback } from "react";
import { Box, Text, useApp } from "ink";
import PromptInput from "./components/PromptInput.js";
import StatusFooter from "./components/StatusFooter.js";
import { useModalInput, useBufferVersion } from "./hooks/useModalInput.js";
import { useVimMode, usePendingKeys } from "./hooks/useVimMode.js";
import { LineBuffer } from "./lib/buffer/LineBuffer.js";
import { VimEngine, orderPositions } from "./lib/vim/index.js";
import { saveSettings } from "./lib/settings/storage.js";
import type { Settings } from "./lib/settings/types.js";

interface AppProps {
  settings: Settings;
  settingsPath: string;
}

export default function App({ settings, settingsPath }: AppProps) {
  const { exit } = useApp();
  const [buffer] = useState(() => new LineBuffer());
  const [engine] = useState(() => new VimEngine(buffer));
  const [viMode, setViMode] = useState(settings.viMode);
  const [entries, setEntries] = useState<string[]>([]);

  useEffect(() => () => engine.dispose(), [engine]);

  useBufferVersion(buffer);
  const mode = useVimMode(engine);
  const pendingKeys = usePendingKeys(engine);

  const toggleViMode = useCallback(() => {
    const next = !viMode;
    setViMode(next);
    try {
      saveSettings(settingsPath, { ...settings, viMode: next });
    } catch (error) {
      console.error("Failed to save settings:", error);
    }
  }, [viMode, settings, settingsPath]);

  const handleSubmit = useCallback(
    (text: string) => {
      const command = text.trim();
      if (command === "/quit") {
        exit();
        return;
      }

      if (command === "/vi") {
        toggleViMode();
      } else if (command !== "") {
        setEntries((prev) => [...prev, text]);
      }
      buffer.setText("");
      engine.reset();
    },
    [buffer, engine, exit, toggleViMode],
  );

  useModalInput({ buffer, engine, viMode, onSubmit: handleSubmit });

  const selection = buffer.getSelection();

  return (
    <Box flexDirection="column">
      {entries.map((entry, i) => (
        <Box key={i} paddingX={1}>
          <Text dimColor>{entry}</Text>
        </Box>
      ))}
      <PromptInput
        lines={buffer.getLines()}
        cursor={buffer.getCursor()}
        selection={
          mode === "visual"
            ? orderPositions(selection.anchor, selection.active)
            : null
        }
        prompt={settings.prompt}
      />
      <StatusFooter mode={mode} pendingKeys={pendingKeys} viMode={viMode} />
    </Box>
  );
}
