import { createContext, useContext, useMemo, useSyncExternalStore, type ReactNode } from 'react';
import type { DownloadManager } from './DownloadManager';
import type { DownloadItem } from './types';

const DownloadContext = createContext<{
  downloads: DownloadItem[];
  manager: DownloadManager;
} | null>(null);

export const useDownloads = () => {
  const ctx = useContext(DownloadContext);
  if (!ctx) throw new Error('useDownloads must be used within DownloadProvider');
  return ctx;
};

export function getRecentDownloads(downloads: DownloadItem[], limit = 5): DownloadItem[] {
  return [...downloads].sort((a, b) => b.startedAt - a.startedAt).slice(0, limit);
}

export default function DownloadProvider({
  manager,
  children,
}: {
  manager: DownloadManager;
  children: ReactNode;
}) {
  const downloads = useSyncExternalStore(manager.subscribe, manager.getSnapshot);
  const value = useMemo(() => ({ downloads, manager }), [downloads, manager]);

  return <DownloadContext.Provider value={value}>{children}</DownloadContext.Provider>;
}
