import { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { getRecentDownloads, useDownloads } from '../features/downloads/DownloadProvider';
import type { DownloadItem } from '../features/downloads/types';

interface Props {
  onClose: () => void;
}

function formatKb(bytes: number): string {
  return `${(bytes / 1024).toFixed(0)} KB`;
}

export function describeDownloadStatus(download: DownloadItem): string {
  switch (download.status) {
    case 'pending':
      return 'Waiting for a save location';
    case 'in-progress':
      return `${formatKb(download.receivedBytes)} / ${download.totalBytes ? formatKb(download.totalBytes) : '??'}`;
    case 'completed':
      return 'Completed';
    case 'canceled':
      return 'Canceled';
    case 'error':
      return `Failed: ${download.error ?? 'unknown error'}`;
  }
}

export default function DownloadPopup({ onClose }: Props) {
  const { downloads, manager } = useDownloads();
  const [selected, setSelected] = useState(0);

  const recent = getRecentDownloads(downloads);
  const current = recent[Math.min(selected, recent.length - 1)];

  useInput((input, key) => {
    if (key.escape) {
      onClose();
      return;
    }
    if (key.upArrow) {
      setSelected((index) => Math.max(0, index - 1));
      return;
    }
    if (key.downArrow) {
      setSelected((index) => Math.min(Math.max(recent.length - 1, 0), index + 1));
      return;
    }
    if (!current) return;

    if (input === 'c') {
      void manager.cancel(current.id);
    } else if (input === 'o') {
      void manager.openFile(current.id);
    }
  });

  return (
    <Box borderStyle="round" flexDirection="column" paddingX={1}>
      <Text bold>Downloads</Text>

      {recent.length === 0 && <Text dimColor>No recent downloads</Text>}

      {recent.map((d) => {
        const isSelected = d.id === current?.id;
        return (
          <Box key={d.id} flexDirection="column">
            <Text inverse={isSelected} wrap="truncate-end">
              {d.filename}
            </Text>
            <Text dimColor>
              {'  '}
              {describeDownloadStatus(d)}
            </Text>
          </Box>
        );
      })}

      <Text dimColor>Up/Down select, c cancel, o open, Esc close</Text>
    </Box>
  );
}
