import { loadConfig } from '../core/config.js';
import type { ConfigLocation } from '../core/config.js';
import { createGitLabClient } from '../core/services.js';
import type { AccountClient, TrackerUser } from '../core/tracker-client.js';
import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';

/** Verifies the configured token by asking the tracker who it belongs to. */
export async function authStatusCommand(
  location: ConfigLocation = {},
  client?: AccountClient,
): Promise<TrackerUser> {
  const config = await loadConfig(location);
  const account = client ?? createGitLabClient(config);
  const user = await withSpinner(`Checking the token against ${config.trackerUrl}...`, () =>
    account.currentUser(),
  );

  logger.success(`Authenticated as ${user.username} on ${config.trackerUrl}`);
  return user;
}
