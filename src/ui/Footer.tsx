import React from "react";
import { Box, Text } from "ink";
import { ViewSnapshot } from "./view";

const HINTS = {
  table: "l: log  c: rename  q: quit",
  log: "t: table  j/k or arrows: scroll  PgUp/PgDn: page  c: rename  q: quit",
  prompt: "Enter: confirm  Esc: cancel",
};

interface Props {
  snapshot: ViewSnapshot;
}

const Footer: React.FC<Props> = ({ snapshot }) => {
  const hint = snapshot.prompt ? HINTS.prompt : HINTS[snapshot.mode];
  return (
    <Box flexDirection="column" marginTop={1}>
      {snapshot.flash && (
        <Text color={snapshot.flash.level === "warn" ? "yellow" : "green"}>
          {snapshot.flash.text}
        </Text>
      )}
      <Text dimColor>{hint}</Text>
    </Box>
  );
};
export default Footer;
