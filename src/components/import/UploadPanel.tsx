import { useState } from "react";

type UploadPanelProps = {
  error: string | null;
  loading: boolean;
  onFile: (file: File) => void;
};

export const UploadPanel = ({ error, loading, onFile }: UploadPanelProps) => {
  const [isDragging, setIsDragging] = useState(false);

  return (
    <section className="panel upload-panel">
      <header className="panel-header">
        <div>
          <p className="eyebrow">Data source</p>
          <h2>Upload your Excel file</h2>
          <p className="muted">
            Place Data.xlsx next to the dashboard, or upload the workbook here. Every sheet is
            loaded and cleaned for this session only.
          </p>
        </div>
      </header>
      <div
        className={`upload-zone ${isDragging ? "dragging" : ""}`}
        onDragOver={(event) => {
          event.preventDefault();
          setIsDragging(true);
        }}
        onDragLeave={() => setIsDragging(false)}
        onDrop={(event) => {
          event.preventDefault();
          setIsDragging(false);
          const file = event.dataTransfer.files[0];
          if (file) {
            onFile(file);
          }
        }}
      >
        <label className="primary file-picker">
          Choose file
          <input
            type="file"
            accept=".xlsx,.xls,.csv"
            disabled={loading}
            onChange={(event) => {
              const file = event.target.files?.[0];
              if (file) {
                onFile(file);
              }
              event.target.value = "";
            }}
          />
        </label>
        <span className="muted">or drop it here</span>
      </div>
      {error && <div className="callout error-callout">{error}</div>}
    </section>
  );
};
