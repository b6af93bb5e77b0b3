import { Box, Text } from 'ink';
import { useTabs } from '../features/tabs/TabsProvider';

const PROGRESS_BAR_WIDTH = 20;

export function formatProgressBar(progress: number, width = PROGRESS_BAR_WIDTH): string {
  const clamped = Math.min(100, Math.max(0, progress));
  const filled = Math.round((clamped / 100) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${clamped}%`;
}

export default function StatusBar() {
  const { chrome } = useTabs();

  return (
    <Box>
      <Box flexGrow={1} marginRight={1}>
        <Text wrap="truncate-end">{chrome.statusMessage}</Text>
      </Box>
      {chrome.progress !== null ? <Text color="green">{formatProgressBar(chrome.progress)}</Text> : null}
    </Box>
  );
}
