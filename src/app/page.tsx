// src/app/page.tsx
"use client";

import { useRef, useState, type DragEvent, type ReactNode } from "react";
import html2canvas from "html2canvas";
import {
  ResponsiveContainer,
  BarChart,
  Bar,
  LineChart,
  Line,
  XAxis,
  YAxis,
  Tooltip,
  CartesianGrid,
} from "recharts";

import type { Charts, Preview, Summary, UploadResponse } from "@/lib/types";
import { api, fetchSampleFile } from "@/lib/client";

/* ------------------------- utils ------------------------- */
const pct = (r: number) => `${Math.round(r * 1000) / 10}%`;

const axisTick = { fill: "#e5e7eb", fontSize: 12 };
const axisStroke = "rgba(255,255,255,0.25)";
const gridStroke = "rgba(255,255,255,0.12)";

function ChartCard({ title, subtitle, children }: { title: string; subtitle: string; children: ReactNode }) {
  const ref = useRef<HTMLDivElement>(null);
  async function exportPNG() {
    if (!ref.current) return;
    const canvas = await html2canvas(ref.current);
    const link = document.createElement("a");
    link.download = `${title.replace(/\s+/g, "_")}.png`;
    link.href = canvas.toDataURL();
    link.click();
  }
  return (
    <div className="card">
      <div className="card-head">
        <p className="card-title">{title}</p>
        <button className="btn" onClick={() => void exportPNG()}>Export PNG</button>
      </div>
      <p className="muted">{subtitle}</p>
      <div ref={ref} style={{ width: "100%", height: 320 }}>{children}</div>
    </div>
  );
}

function Stat({ label, value }: { label: string; value: ReactNode }) {
  return (
    <div className="card">
      <div className="muted">{label}</div>
      <div className="stat-value">{value}</div>
    </div>
  );
}

/* ------------------------- component ------------------------- */
type Result = { id: string; summary: Summary; charts: Charts; preview: Preview };

export default function Home() {
  const [result, setResult] = useState<Result | null>(null);
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState("");
  const [dzHover, setDzHover] = useState(false);
  const [fileName, setFileName] = useState("");
  const inputRef = useRef<HTMLInputElement>(null);

  async function upload(file: File) {
    setBusy(true);
    setError("");
    setFileName(file.name);
    try {
      const form = new FormData();
      form.append("file", file);
      const { dataset_id: id } = await api<UploadResponse>("/api/upload", { method: "POST", body: form });
      const [summary, charts, preview] = await Promise.all([
        api<Summary>(`/api/datasets/${id}/summary`),
        api<Charts>(`/api/datasets/${id}/charts`),
        api<Preview>(`/api/datasets/${id}/preview`),
      ]);
      setResult({ id, summary, charts, preview });
    } catch (e) {
      setResult(null);
      setError(e instanceof Error ? e.message : "Upload failed");
    } finally {
      setBusy(false);
    }
  }

  async function loadSample() {
    try {
      await upload(await fetchSampleFile());
    } catch (e) {
      setResult(null);
      setError(e instanceof Error ? e.message : "Could not load sample data");
    }
  }

  function onDrop(e: DragEvent<HTMLDivElement>) {
    e.preventDefault();
    setDzHover(false);
    const file = e.dataTransfer.files[0];
    if (file) void upload(file);
  }

  const s = result?.summary;
  const cat = result?.charts.by_category_top5;
  const byDate = result?.charts.by_date;

  return (
    <>
      <div
        className={`dropzone${dzHover ? " hover" : ""}`}
        onDragOver={(e) => { e.preventDefault(); setDzHover(true); }}
        onDragLeave={() => setDzHover(false)}
        onDrop={onDrop}
      >
        <p>Drop a CSV file here</p>
        <input
          ref={inputRef}
          type="file"
          accept=".csv,text/csv"
          hidden
          onChange={(e) => { const f = e.target.files?.[0]; if (f) void upload(f); }}
        />
        <button className="btn" disabled={busy} onClick={() => inputRef.current?.click()}>Choose file</button>{" "}
        <button className="btn" disabled={busy} onClick={() => void loadSample()}>Load sample</button>
        {busy && <p className="muted">Analyzing {fileName}…</p>}
        {error && <p className="error">{error}</p>}
      </div>

      {s && (
        <section className="stats">
          <Stat label="Rows" value={s.row_count} />
          <Stat label="Columns" value={s.column_count} />
          <Stat label="Latest date" value={s.latest_date ? s.latest_date.slice(0, 10) : "—"} />
          <Stat
            label="Top category"
            value={s.top_category ? `${s.top_category.value} (${pct(s.top_category.ratio)})` : "—"}
          />
          <Stat
            label="Columns with ≥30% missing"
            value={s.missing_columns.length ? s.missing_columns.join(", ") : "None"}
          />
        </section>
      )}

      {result && (
        <section className="charts">
          {cat ? (
            <ChartCard title={cat.title} subtitle={cat.explanation}>
              <ResponsiveContainer>
                <BarChart data={cat.data}>
                  <CartesianGrid stroke={gridStroke} />
                  <XAxis dataKey="label" tick={axisTick} stroke={axisStroke} />
                  <YAxis allowDecimals={false} tick={axisTick} stroke={axisStroke} />
                  <Tooltip />
                  <Bar dataKey="value" name={cat.y_label} fill="#60a5fa" />
                </BarChart>
              </ResponsiveContainer>
            </ChartCard>
          ) : (
            <div className="card muted">No category column to chart.</div>
          )}
          {byDate ? (
            <ChartCard title={byDate.title} subtitle={byDate.explanation}>
              <ResponsiveContainer>
                <LineChart data={byDate.data}>
                  <CartesianGrid stroke={gridStroke} />
                  <XAxis dataKey="date" tick={axisTick} stroke={axisStroke} />
                  <YAxis allowDecimals={false} tick={axisTick} stroke={axisStroke} />
                  <Tooltip />
                  <Line type="monotone" dataKey="count" name={byDate.y_label} stroke="#a78bfa" dot={false} />
                </LineChart>
              </ResponsiveContainer>
            </ChartCard>
          ) : (
            <div className="card muted">No date column to chart.</div>
          )}
        </section>
      )}

      {result && (
        <section className="card">
          <p className="card-title">Preview ({result.preview.rows.length} of {result.summary.row_count} rows)</p>
          <div className="table-wrap">
            <table>
              <thead>
                <tr>
                  {result.preview.columns.map((c) => (
                    <th key={c.name}>{c.name}<span className="badge">{c.type}</span></th>
                  ))}
                </tr>
              </thead>
              <tbody>
                {result.preview.rows.map((row, i) => (
                  <tr key={i}>
                    {row.map((cell, j) => <td key={j}>{cell}</td>)}
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        </section>
      )}
    </>
  );
}
