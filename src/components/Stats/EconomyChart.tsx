import { useMemo } from 'react';
import {
  LineChart, Line, XAxis, YAxis, Tooltip,
  ResponsiveContainer, Legend, ReferenceLine,
} from 'recharts';
import type { FrameSnapshot, PlayerDetails } from '../../types/replay.types';
import { hexToCSS } from '../../utils/ColorUtils';
import { playerLabel } from '../../utils/player-utils';
import { userColor } from '../../utils/unit-classifier';

interface Props {
  snapshots: FrameSnapshot[];
  players: PlayerDetails[];
  currentFrame?: number;
}

export function EconomyChart({ snapshots, players, currentFrame }: Props) {
  const merged = useMemo(() => {
    const frameMap = new Map<number, Record<string, number>>();
    for (const s of snapshots) {
      const existing = frameMap.get(s.frame) ?? { frame: s.frame };
      existing[`p${s.userId}_minerals`] = s.minerals;
      existing[`p${s.userId}_vespene`] = s.vespene;
      frameMap.set(s.frame, existing);
    }
    return [...frameMap.values()].sort((a, b) => a.frame - b.frame);
  }, [snapshots]);

  const userIds = useMemo(
    () => [...new Set(snapshots.map((s) => s.userId))].sort((a, b) => a - b),
    [snapshots],
  );

  if (merged.length === 0) return null;

  return (
    <div className="economy-chart">
      <h3>Economy: Unspent Resources</h3>
      <ResponsiveContainer width="100%" height={250}>
        <LineChart data={merged}>
          <XAxis dataKey="frame" stroke="#7a756b" tick={{ fontSize: 10 }} />
          <YAxis stroke="#7a756b" tick={{ fontSize: 10 }} />
          <Tooltip
            labelFormatter={(v) => `Frame ${Number(v)}`}
            contentStyle={{
              backgroundColor: '#1a1a24',
              border: '1px solid #2a2a35',
              borderRadius: '6px',
            }}
          />
          {currentFrame !== undefined && (
            <ReferenceLine x={currentFrame} stroke="#f4f5f8" strokeDasharray="3 3" strokeOpacity={0.5} />
          )}
          {userIds.map((id) => (
            <Line
              key={`${id}_minerals`}
              type="monotone"
              dataKey={`p${id}_minerals`}
              name={`${playerLabel(players, id)} Minerals`}
              stroke={hexToCSS(userColor(id - 1))}
              strokeWidth={2}
              dot={false}
            />
          ))}
          {userIds.map((id) => (
            <Line
              key={`${id}_vespene`}
              type="monotone"
              dataKey={`p${id}_vespene`}
              name={`${playerLabel(players, id)} Vespene`}
              stroke={hexToCSS(userColor(id - 1))}
              strokeWidth={1.5}
              strokeDasharray="4 2"
              dot={false}
              opacity={0.6}
            />
          ))}
          <Legend wrapperStyle={{ fontSize: 11 }} />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
