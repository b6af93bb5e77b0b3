import { Box, Text, useInput } from 'ink';

interface Props {
  message: string;
  onAnswer: (yes: boolean) => void;
}

export default function ConfirmPrompt({ message, onAnswer }: Props) {
  useInput((input, key) => {
    const answer = input.toLowerCase();
    if (answer === 'y') {
      onAnswer(true);
    } else if (answer === 'n' || key.escape) {
      onAnswer(false);
    }
  });

  return (
    <Box borderStyle="round" borderColor="yellow" paddingX={1}>
      <Text>{message} </Text>
      <Text dimColor>[y/n]</Text>
    </Box>
  );
}
