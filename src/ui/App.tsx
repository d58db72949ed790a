import React, { useEffect, useState } from "react";
import { Box, Text, useInput, useStdout } from "ink";
import TablePane from "./TablePane";
import LogPane from "./LogPane";
import RenamePrompt from "./RenamePrompt";
import Footer from "./Footer";
import { InteractiveView, ViewSnapshot } from "./view";

// title, pane header, footer and prompt
const RESERVED_ROWS = 6;

interface Props {
  view: InteractiveView;
}

const App: React.FC<Props> = ({ view }) => {
  const [snapshot, setSnapshot] = useState<ViewSnapshot>(() => view.snapshot());
  const { stdout } = useStdout();

  useEffect(() => {
    const unsubscribe = view.subscribe(setSnapshot);
    // catch up on anything published between render and this effect
    setSnapshot(view.snapshot());
    return unsubscribe;
  }, [view]);

  useEffect(() => {
    if (!stdout) return;
    const resize = () => {
      if (stdout.rows) view.setViewport(stdout.rows - RESERVED_ROWS);
    };
    resize();
    stdout.on("resize", resize);
    return () => {
      stdout.off("resize", resize);
    };
  }, [stdout, view]);

  useInput((input, key) => view.handleKey(input, key));

  return (
    <Box flexDirection="column">
      <Text bold color="blue">
        {`Charger telemetry - ${snapshot.rows.length} batter${snapshot.rows.length === 1 ? "y" : "ies"}`}
      </Text>
      {snapshot.mode === "table" ? (
        <TablePane rows={snapshot.rows} />
      ) : (
        <LogPane
          lines={snapshot.logLines}
          scroll={snapshot.logScroll}
          total={snapshot.logTotal}
        />
      )}
      {snapshot.prompt && (
        <RenamePrompt
          prompt={snapshot.prompt}
          onChange={(value) => view.setPromptInput(value)}
          onSubmit={() => view.submitPrompt()}
        />
      )}
      <Footer snapshot={snapshot} />
    </Box>
  );
};
export default App;
