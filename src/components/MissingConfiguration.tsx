import React from "react";

export default function MissingConfiguration({ missing }: { missing: readonly string[] }) {
  return (
    <main className="missing-config">
      <h1>⚠️ Missing environment variables</h1>
      <p>The assistant needs the following environment variables:</p>
      <ul>
        {missing.map((name) => (
          <li key={name}>
            <code>{name}</code>
          </li>
        ))}
      </ul>

      <h2>How to set them</h2>
      <ol>
        <li>
          On a hosting platform: open the app settings, find the environment variables section and add the
          variables listed above, then redeploy.
        </li>
        <li>
          Locally: create a <code>.env.local</code> file in the project root (see <code>.env.example</code>) with
          lines in the form <code>NAME=value</code>, then restart the server.
        </li>
      </ol>
    </main>
  );
}
