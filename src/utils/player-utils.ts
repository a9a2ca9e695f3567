import type { FrameSnapshot, PlayerDetails } from '../types/replay.types';

/**
 * Undo the few escapes replay files put into clan-tagged names.
 */
export function cleanPlayerName(name: string): string {
  return name
    .replaceAll('&lt;', '<')
    .replaceAll('&gt;', '>')
    .replaceAll('<sp/>', ' ');
}

/**
 * Player a snapshot belongs to. Tracker player ids start at 1, team ids at 0.
 * When several players share the team, the last one in the list is used.
 */
export function playerForSnapshot(
  players: readonly PlayerDetails[],
  snapshot: Pick<FrameSnapshot, 'userId'>,
): PlayerDetails | undefined {
  const teamId = Math.max(snapshot.userId - 1, 0);
  let match: PlayerDetails | undefined;
  for (const player of players) {
    if (player.teamId === teamId) match = player;
  }
  return match;
}

export function playerLabel(players: readonly PlayerDetails[], userId: number): string {
  const player = playerForSnapshot(players, { userId });
  return player ? cleanPlayerName(player.name) : `Player ${userId}`;
}
