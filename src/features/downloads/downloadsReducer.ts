import type { DownloadItem } from './types';

export type DownloadsState = DownloadItem[];

export type DownloadsAction =
  | { type: 'ADD'; payload: DownloadItem }
  | { type: 'PROGRESS'; payload: { id: string; receivedBytes: number; totalBytes: number } }
  | { type: 'ACCEPT'; payload: { id: string; savePath: string } }
  | { type: 'ENGINE_DONE'; payload: { id: string } }
  | { type: 'DONE'; payload: { id: string; endedAt: number } }
  | { type: 'ERROR'; payload: { id: string; error: string; endedAt: number } }
  | { type: 'CANCEL'; payload: { id: string; endedAt: number } }
  | { type: 'PROMPT_ANSWERED'; payload: { id: string } };

export function downloadsReducer(state: DownloadsState, action: DownloadsAction): DownloadsState {
  switch (action.type) {
    case 'ADD':
      return [...state, action.payload];
    case 'PROGRESS':
      return state.map((d) =>
        d.id === action.payload.id
          ? {
              ...d,
              receivedBytes: action.payload.receivedBytes,
              totalBytes: action.payload.totalBytes,
            }
          : d,
      );
    case 'ACCEPT':
      return state.map((d) =>
        d.id === action.payload.id && d.status === 'pending'
          ? { ...d, status: 'in-progress', savePath: action.payload.savePath }
          : d,
      );
    case 'ENGINE_DONE':
      return state.map((d) => (d.id === action.payload.id ? { ...d, engineFinished: true } : d));
    case 'DONE':
      return state.map((d) =>
        d.id === action.payload.id
          ? {
              ...d,
              status: 'completed',
              receivedBytes: Math.max(d.receivedBytes, d.totalBytes),
              openPromptPending: true,
              endedAt: action.payload.endedAt,
            }
          : d,
      );
    case 'ERROR':
      return state.map((d) =>
        d.id === action.payload.id
          ? { ...d, status: 'error', error: action.payload.error, endedAt: action.payload.endedAt }
          : d,
      );
    case 'CANCEL':
      return state.map((d) =>
        d.id === action.payload.id
          ? { ...d, status: 'canceled', endedAt: action.payload.endedAt }
          : d,
      );
    case 'PROMPT_ANSWERED':
      return state.map((d) =>
        d.id === action.payload.id ? { ...d, openPromptPending: false } : d,
      );
    default:
      return state;
  }
}
