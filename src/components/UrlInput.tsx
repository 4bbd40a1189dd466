import { Box, Text } from "ink";
import TextInput from "ink-text-input";

interface UrlInputProps {
  value: string;
  focused: boolean;
  onChange: (value: string) => void;
  onSubmit: (value: string) => void;
}

export function UrlInput({ value, focused, onChange, onSubmit }: UrlInputProps) {
  return (
    <Box borderStyle="round" borderColor={focused ? "cyan" : "gray"} paddingX={1}>
      <Text bold={focused}>URL </Text>
      <TextInput
        value={value}
        focus={focused}
        placeholder="Enter RSS feed URL and press Enter..."
        onChange={onChange}
        onSubmit={onSubmit}
      />
    </Box>
  );
}
