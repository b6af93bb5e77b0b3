import { createContext, useContext, useMemo, useSyncExternalStore, type ReactNode } from 'react';
import type { TabManager } from './TabManager';
import type { TabsSnapshot } from './types';

type TabsContextType = TabsSnapshot & {
  manager: TabManager;
};

const TabsContext = createContext<TabsContextType | null>(null);

export const useTabs = () => {
  const ctx = useContext(TabsContext);
  if (!ctx) throw new Error('useTabs must be used within TabsProvider');
  return ctx;
};

export default function TabsProvider({
  manager,
  children,
}: {
  manager: TabManager;
  children: ReactNode;
}) {
  const snapshot = useSyncExternalStore(manager.subscribe, manager.getSnapshot);
  const value = useMemo(() => ({ ...snapshot, manager }), [snapshot, manager]);

  return <TabsContext.Provider value={value}>{children}</TabsContext.Provider>;
}
