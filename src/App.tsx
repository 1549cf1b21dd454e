import React from "react";
import { Static, Text } from "ink";
import { useOutputStore, type OutputEntry } from "./lib/output.js";
import { MessageLine } from "./components/MessageLine.js";
import { PackageTable } from "./components/PackageTable.js";
import { ProfileList } from "./components/ProfileList.js";
import { SearchResults } from "./components/SearchResults.js";

function Entry({ entry }: { entry: OutputEntry }) {
  switch (entry.kind) {
    case "message":
      return <MessageLine level={entry.level} text={entry.text} />;
    case "detail":
      return <Text>{entry.text}</Text>;
    case "packages":
      return <PackageTable profile={entry.profile} rows={entry.rows} />;
    case "profiles":
      return <ProfileList profiles={entry.profiles} active={entry.active} />;
    case "search":
      return <SearchResults query={entry.query} results={entry.results} />;
  }
}

/** Everything logged so far, printed once and never redrawn. */
export function App() {
  const entries = useOutputStore((state) => state.entries);

  return <Static items={entries}>{(entry) => <Entry key={entry.id} entry={entry} />}</Static>;
}
