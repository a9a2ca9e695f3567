import { useState } from 'react';
import { useReplayStore } from '../../state/replayStore';

export function ReplayLoader() {
  const [dragging, setDragging] = useState(false);
  const loadFiles = useReplayStore((s) => s.loadFiles);
  const pending = useReplayStore((s) => s.pending);

  const handleFiles = (list: FileList | null) => {
    if (!list || list.length === 0) return;
    void loadFiles(Array.from(list));
  };

  return (
    <div
      className={dragging ? 'replay-loader is-dragging' : 'replay-loader'}
      onDragOver={(e) => {
        e.preventDefault();
        setDragging(true);
      }}
      onDragLeave={() => setDragging(false)}
      onDrop={(e) => {
        e.preventDefault();
        setDragging(false);
        handleFiles(e.dataTransfer.files);
      }}
    >
      <h1>SC2 Replay Timeline</h1>
      <p>Drop replay exports here or pick them from disk. Several files load in parallel.</p>
      <input
        type="file"
        accept=".json,application/json"
        multiple
        onChange={(e) => {
          handleFiles(e.target.files);
          e.target.value = '';
        }}
      />
      {pending.length > 0 && (
        <p className="replay-loader__pending">Reading {pending.length} file{pending.length === 1 ? '' : 's'}...</p>
      )}
    </div>
  );
}
