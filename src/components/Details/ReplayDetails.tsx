import { useMemo } from 'react';
import { extractUpgrades } from '../../services/snapshot-extractor';
import type { ProcessedReplay } from '../../types/replay.types';
import {
  formatReplayTime,
  mapLink,
  mapName,
  messageSender,
  playerColorCSS,
  profileUrl,
  recipientLabel,
  resultLabel,
} from '../../utils/details-utils';
import { cleanPlayerName, playerLabel } from '../../utils/player-utils';

/**
 * Header information of a replay: map, start time, players, chat and
 * finished research up to the current frame.
 */
export function ReplayDetails({ replay, frame }: { replay: ProcessedReplay; frame: number }) {
  const { details, messages } = replay;
  const players = details.playerList;

  const upgrades = useMemo(() => extractUpgrades(replay.trackerEvents), [replay]);
  const chat = useMemo(() => {
    let at = 0;
    return messages.map((m) => {
      at += m.delta;
      return { ...m, frame: at };
    });
  }, [messages]);

  const doneUpgrades = upgrades.filter((u) => u.frame <= frame);

  return (
    <div className="replay-details">
      <h2>
        <a href={mapLink(details)} target="_blank" rel="noreferrer">{mapName(details)}</a>
        {details.isBlizzardMap && <span className="replay-details__badge">Official map</span>}
      </h2>
      {details.description && <p className="replay-details__description">{details.description}</p>}
      <p className="replay-details__time">Played {formatReplayTime(details.timeUtc)}</p>

      <ul className="replay-details__players">
        {players.map((p, i) => {
          const result = resultLabel(p.result);
          return (
            <li key={`${p.toon.id}-${i}`}>
              <span className="replay-details__swatch" style={{ background: playerColorCSS(p.color) }} />
              <span className="replay-details__race">{p.race}</span>
              <a href={profileUrl(p.toon)} target="_blank" rel="noreferrer">{cleanPlayerName(p.name)}</a>
              <span className={`replay-details__result replay-details__result--${result.tone}`}>{result.label}</span>
            </li>
          );
        })}
      </ul>

      {chat.length > 0 && (
        <>
          <h3>Chat</h3>
          <ul className="replay-details__chat">
            {chat.map((m, i) => (
              <li key={i} title={`Frame ${m.frame}`}>
                <strong>{messageSender(players, m.userId) || `Slot ${m.userId}`}</strong>
                <em>{recipientLabel(m.recipient)}</em>
                {m.text}
              </li>
            ))}
          </ul>
        </>
      )}

      {doneUpgrades.length > 0 && (
        <>
          <h3>Upgrades</h3>
          <ul className="replay-details__upgrades">
            {doneUpgrades.map((u, i) => (
              <li key={i}>
                {u.name} <span>({playerLabel(players, u.playerId)}, frame {u.frame})</span>
              </li>
            ))}
          </ul>
        </>
      )}
    </div>
  );
}
