import { latestSnapshots } from '../../services/snapshot-extractor';
import type { ProcessedReplay } from '../../types/replay.types';
import { hexToCSS } from '../../utils/ColorUtils';
import { playerLabel } from '../../utils/player-utils';
import { userColor } from '../../utils/unit-classifier';

export function PlayerStats({ replay, frame }: { replay: ProcessedReplay; frame: number }) {
  const rows = latestSnapshots(replay.snapshots, frame);
  const players = replay.details.playerList;

  if (rows.length === 0) {
    return <div className="player-stats player-stats--empty">No player stats yet</div>;
  }

  return (
    <table className="player-stats">
      <thead>
        <tr>
          <th>Player</th>
          <th>Minerals</th>
          <th>Vespene</th>
          <th>Supply</th>
          <th>Army</th>
        </tr>
      </thead>
      <tbody>
        {rows.map((s) => (
          <tr key={s.userId}>
            <td style={{ color: hexToCSS(userColor(s.userId - 1)) }}>{playerLabel(players, s.userId)}</td>
            <td>{s.minerals}</td>
            <td>{s.vespene}</td>
            <td>{s.supplyUsed}/{s.supplyCap}</td>
            <td>{s.armyMinerals + s.armyVespene}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}
