import { selectedReplay, useReplayStore } from '../../state/replayStore';

export function Timeline() {
  const replay = useReplayStore(selectedReplay);
  const currentFrame = useReplayStore((s) => s.currentFrame);
  const setCurrentFrame = useReplayStore((s) => s.setCurrentFrame);

  if (!replay) return null;

  return (
    <div className="timeline">
      <span className="timeline__frame">
        {currentFrame} / {replay.totalFrames}
      </span>
      <input
        type="range"
        min={0}
        max={replay.totalFrames}
        step={1}
        value={currentFrame}
        onChange={(e) => setCurrentFrame(Number(e.target.value))}
      />
    </div>
  );
}
