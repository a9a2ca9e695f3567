import { ReplayDetails } from './components/Details/ReplayDetails';
import { EconomyChart } from './components/Stats/EconomyChart';
import { LayerControls } from './components/Layers/LayerControls';
import { MapCanvas } from './components/MapCanvas/MapCanvas';
import { PlayerStats } from './components/Stats/PlayerStats';
import { ReplayList } from './components/ReplayList/ReplayList';
import { ReplayLoader } from './components/ReplayLoader/ReplayLoader';
import { Timeline } from './components/Timeline/Timeline';
import { selectedReplay, useReplayStore } from './state/replayStore';

export default function App() {
  const replay = useReplayStore(selectedReplay);
  const currentFrame = useReplayStore((s) => s.currentFrame);
  const hasFiles = useReplayStore((s) => s.replays.length + s.pending.length + s.failures.length > 0);

  // Show loader if nothing was uploaded yet
  if (!hasFiles) {
    return (
      <div className="app app--empty">
        <ReplayLoader />
      </div>
    );
  }

  return (
    <div className="app">
      <header className="app__header">
        <ReplayLoader />
        <button onClick={() => useReplayStore.getState().reset()}>Clear</button>
      </header>

      <div className="app__main">
        <ReplayList />
        <div className="app__map">
          <MapCanvas />
          <LayerControls />
        </div>
        {replay && (
          <section className="app__stats">
            <ReplayDetails replay={replay} frame={currentFrame} />
            <PlayerStats replay={replay} frame={currentFrame} />
            <EconomyChart
              snapshots={replay.snapshots}
              players={replay.details.playerList}
              currentFrame={currentFrame}
            />
          </section>
        )}
      </div>

      <Timeline />
    </div>
  );
}
