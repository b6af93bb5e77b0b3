import { Box, Text } from 'ink';
import { useTabs } from './TabsProvider';
import { getDisplayTitle } from './displayTitle';
import type { Tab } from './types';

const MAX_TAB_TITLE_LENGTH = 24;

export function formatTabLabel(tab: Tab, index: number): string {
  const title = getDisplayTitle(tab.url, tab.title);
  const clipped =
    title.length > MAX_TAB_TITLE_LENGTH ? `${title.slice(0, MAX_TAB_TITLE_LENGTH - 3)}...` : title;
  return `${index + 1}:${clipped}${tab.isLoading ? ' *' : ''}`;
}

export default function TabBar() {
  const { tabs, activeId } = useTabs();

  return (
    <Box flexWrap="wrap">
      {tabs.map((tab, index) => {
        const isActive = tab.id === activeId;
        return (
          <Box key={tab.id} marginRight={1}>
            <Text inverse={isActive} bold={isActive}>
              {` ${formatTabLabel(tab, index)} `}
            </Text>
          </Box>
        );
      })}
      <Text dimColor>+ Ctrl+T</Text>
    </Box>
  );
}
