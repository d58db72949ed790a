import React from "react";
import { Box, Text } from "ink";
import TextInput from "ink-text-input";
import { PromptState } from "./view";

interface Props {
  prompt: Readonly<PromptState>;
  onChange(value: string): void;
  onSubmit(): void;
}

const RenamePrompt: React.FC<Props> = ({ prompt, onChange, onSubmit }) => {
  const question =
    prompt.stage === "target"
      ? "Battery to rename (label or number): "
      : `New label for battery ${prompt.currentLabel}: `;
  return (
    <Box>
      <Text color="cyan">{question}</Text>
      <TextInput value={prompt.input} onChange={onChange} onSubmit={() => onSubmit()} />
    </Box>
  );
};
export default RenamePrompt;
