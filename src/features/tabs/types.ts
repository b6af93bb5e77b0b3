/**
 * Opaque handle the tab manager hands out for each tab.
 */
export type TabHandle = string;

/**
 * Per-tab state as reported by the engine view. Nothing here is tracked
 * independently of the view's own signals.
 */
export type Tab = {
  id: TabHandle;
  url: string;
  title: string;
  isLoading: boolean;
  progress: number | null;
};

/**
 * What the chrome around the active tab shows.
 */
export type ChromeState = {
  addressText: string;
  canGoBack: boolean;
  canGoForward: boolean;
  statusMessage: string;
  progress: number | null;
  windowTitle: string;
};

export type TabsSnapshot = {
  tabs: Tab[];
  activeId: TabHandle;
  chrome: ChromeState;
};
