import React from "react";
import { Box, Text } from "ink";

interface ProfileListProps {
  profiles: string[];
  active: string;
}

export function ProfileList({ profiles, active }: ProfileListProps) {
  return (
    <Box flexDirection="column">
      <Text>
        <Text color="cyan" bold>
          ==&gt;
        </Text>{" "}
        Available profiles:
      </Text>
      {profiles.length === 0 && <Text color="gray">  (no profiles)</Text>}
      {profiles.map((name) =>
        name === active ? (
          <Text key={name} color="green">
            {"  * "}
            {name} (active)
          </Text>
        ) : (
          <Text key={name}>
            {"    "}
            {name}
          </Text>
        ),
      )}
    </Box>
  );
}
