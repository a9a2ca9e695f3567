import { useReplayStore } from '../../state/replayStore';
import { cleanPlayerName } from '../../utils/player-utils';

export function ReplayList() {
  const { replays, pending, failures, selectedIndex, selectReplay, cancelRead, dismissFailure } = useReplayStore();

  return (
    <aside className="replay-list">
      <ul>
        {replays.map((r, i) => (
          <li key={`${r.name}-${i}`}>
            <button
              onClick={() => selectReplay(i)}
              className={i === selectedIndex ? 'replay-list__item is-selected' : 'replay-list__item'}
            >
              <span className="replay-list__name">{r.name}</span>
              <span className="replay-list__players">
                {r.details.playerList.map((p) => cleanPlayerName(p.name)).join(' vs ')}
              </span>
            </button>
          </li>
        ))}
      </ul>

      {pending.map((name) => (
        <div key={name} className="replay-list__pending">
          <span>{name}</span>
          <button onClick={() => cancelRead(name)}>Cancel</button>
        </div>
      ))}

      {failures.map((f) => (
        <div key={f.name} className="replay-list__failure">
          <span>{f.message}</span>
          <button onClick={() => dismissFailure(f.name)}>Dismiss</button>
        </div>
      ))}
    </aside>
  );
}
