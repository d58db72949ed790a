import React from "react";
import { Box, Text } from "ink";
import { DisplayRow } from "../types";

interface Column {
  title: string;
  width: number;
  value(row: DisplayRow): string;
}

const COLUMNS: Column[] = [
  { title: "Battery", width: 10, value: (r) => r.label },
  { title: "Device", width: 14, value: (r) => r.externalId },
  { title: "Voltage mV", width: 11, value: (r) => String(r.voltage) },
  { title: "R", width: 7, value: (r) => String(r.resistance) },
  { title: "Capacity", width: 9, value: (r) => String(r.capacity) },
  { title: "Discharge", width: 10, value: (r) => String(r.dischargeCurrent) },
  { title: "Adv", width: 8, value: (r) => String(r.advCount) },
  { title: "Uptime s", width: 10, value: (r) => r.uptimeSeconds.toFixed(1) },
  { title: "Mode", width: 18, value: (r) => r.mode },
];

function cell(text: string, width: number): string {
  return text.length >= width ? text.slice(0, width - 1) + " " : text.padEnd(width);
}

interface Props {
  rows: readonly DisplayRow[];
}

const TablePane: React.FC<Props> = ({ rows }) => {
  return (
    <Box flexDirection="column">
      <Text bold inverse>
        {COLUMNS.map((c) => cell(c.title, c.width)).join("")}
      </Text>
      {rows.length === 0 ? (
        <Text dimColor>Waiting for beacons...</Text>
      ) : (
        rows.map((row) => (
          <Text key={row.batteryId}>
            {COLUMNS.map((c) => cell(c.value(row), c.width)).join("")}
          </Text>
        ))
      )}
    </Box>
  );
};
export default TablePane;
