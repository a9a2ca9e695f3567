import type {
  Details,
  GameResult,
  MessageRecipient,
  PlayerColor,
  PlayerDetails,
  PlayerToon,
} from '../types/replay.types';
import { cleanPlayerName } from './player-utils';

/** Difference between the Windows FILETIME epoch (1601) and the Unix epoch, in 100ns ticks. */
const FILETIME_UNIX_EPOCH = 116444736000000000;
const FILETIME_TICKS_PER_MS = 10000;

/** Some replays leave the map file name empty; the title is used then. */
export function mapName(details: Pick<Details, 'mapFileName' | 'title'>): string {
  return details.mapFileName || details.title;
}

export function mapLink(details: Pick<Details, 'mapFileName' | 'title'>): string {
  return `https://liquipedia.net/starcraft2/${mapName(details).replaceAll(' ', '_')}`;
}

/**
 * Replay start time. Values in the FILETIME range are shown as ISO dates,
 * anything else as the raw number.
 */
export function formatReplayTime(timeUtc: number): string {
  if (timeUtc < FILETIME_UNIX_EPOCH) return String(timeUtc);
  return new Date((timeUtc - FILETIME_UNIX_EPOCH) / FILETIME_TICKS_PER_MS).toISOString();
}

export function profileUrl(toon: PlayerToon): string {
  return `https://starcraft2.blizzard.com/en-us/profile/${toon.region}/${toon.realm}/${toon.id}`;
}

export type ResultTone = 'success' | 'warning' | 'danger' | 'info';

const RESULT_LABELS: Record<GameResult, { label: string; tone: ResultTone }> = {
  Win: { label: 'Winner', tone: 'success' },
  Tie: { label: 'Tie', tone: 'warning' },
  Loss: { label: 'Lost', tone: 'danger' },
  Undecided: { label: 'Undecided', tone: 'info' },
};

export function resultLabel(result: GameResult): { label: string; tone: ResultTone } {
  return RESULT_LABELS[result];
}

const RECIPIENT_LABELS: Record<MessageRecipient, string> = {
  All: 'To All',
  Allies: 'To Allies',
  Individual: 'To Individual',
  Battlenet: 'To Battlenet',
  Observers: 'To Observers',
};

export function recipientLabel(recipient: MessageRecipient): string {
  return RECIPIENT_LABELS[recipient];
}

/** Player colour as CSS; the alpha byte is scaled to 0-1. */
export function playerColorCSS(color: PlayerColor): string {
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${color.a / 255})`;
}

/**
 * Name of the player who sent a chat message. Message user ids are working
 * set slots; the last player in that slot wins. Empty when nobody matches.
 */
export function messageSender(players: readonly PlayerDetails[], userId: number): string {
  let sender = '';
  for (const player of players) {
    if (player.workingSetSlotId === userId) sender = cleanPlayerName(player.name);
  }
  return sender;
}
