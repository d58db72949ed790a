import React from "react";
import { Box, Text } from "ink";

interface Props {
  lines: readonly string[];
  scroll: number;
  total: number;
}

const LogPane: React.FC<Props> = ({ lines, scroll, total }) => {
  return (
    <Box flexDirection="column">
      <Text bold inverse>
        {`Log (${total} lines${scroll > 0 ? `, ${scroll} back` : ""})`}
      </Text>
      {lines.length === 0 ? (
        <Text dimColor>No log entries yet.</Text>
      ) : (
        lines.map((line, i) => (
          // lines have no identity of their own
          <Text key={i} wrap="truncate-end">
            {line}
          </Text>
        ))
      )}
    </Box>
  );
};
export default LogPane;
