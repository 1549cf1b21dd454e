import { create } from "zustand";
import type { MessageLevel, PackageRow, SearchResult } from "./types.js";

export type OutputEntry =
  | { id: number; kind: "message"; level: MessageLevel; text: string }
  | { id: number; kind: "detail"; text: string }
  | { id: number; kind: "packages"; profile: string; rows: PackageRow[] }
  | { id: number; kind: "profiles"; profiles: string[]; active: string }
  | { id: number; kind: "search"; query: string; results: SearchResult[] };

type NewEntry =
  | { kind: "message"; level: MessageLevel; text: string }
  | { kind: "detail"; text: string }
  | { kind: "packages"; profile: string; rows: PackageRow[] }
  | { kind: "profiles"; profiles: string[]; active: string }
  | { kind: "search"; query: string; results: SearchResult[] };

interface OutputStore {
  entries: OutputEntry[];
  nextId: number;
  push: (entry: NewEntry) => void;
  clear: () => void;
}

export const useOutputStore = create<OutputStore>((set) => ({
  entries: [],
  nextId: 1,
  push: (entry) => {
    set((state) => ({
      entries: [...state.entries, { ...entry, id: state.nextId }],
      nextId: state.nextId + 1,
    }));
  },
  clear: () => set({ entries: [], nextId: 1 }),
}));

function message(level: MessageLevel, text: string): void {
  useOutputStore.getState().push({ kind: "message", level, text });
}

export function info(text: string): void {
  message("info", text);
}

export function success(text: string): void {
  message("success", text);
}

export function warn(text: string): void {
  message("warning", text);
}

export function error(text: string): void {
  message("error", text);
}

/** Raw output lines of an external command. */
export function detail(text: string): void {
  useOutputStore.getState().push({ kind: "detail", text });
}

export function showPackages(profile: string, rows: PackageRow[]): void {
  useOutputStore.getState().push({ kind: "packages", profile, rows });
}

export function showProfiles(profiles: string[], active: string): void {
  useOutputStore.getState().push({ kind: "profiles", profiles, active });
}

export function showSearchResults(query: string, results: SearchResult[]): void {
  useOutputStore.getState().push({ kind: "search", query, results });
}

export function messagesAt(level: MessageLevel): string[] {
  return useOutputStore
    .getState()
    .entries.flatMap((entry) => (entry.kind === "message" && entry.level === level ? [entry.text] : []));
}
