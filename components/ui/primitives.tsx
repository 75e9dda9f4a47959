"use client";

import {
  useState,
  type ButtonHTMLAttributes,
  type CSSProperties,
  type InputHTMLAttributes,
  type ReactNode,
  type TextareaHTMLAttributes,
} from "react";

const fieldStyle: CSSProperties = {
  display: "block",
  width: "100%",
  padding: "10px 12px",
  background: "var(--surface-3)",
  border: "1px solid var(--border-default)",
  borderRadius: "var(--radius)",
  color: "var(--text-primary)",
  fontSize: 13,
  fontFamily: "inherit",
  outline: "none",
  transition: "border-color 0.15s",
};

/* ─── MonoLabel ─────────────────────────────────────────── */

export function MonoLabel({ children }: { children: ReactNode }) {
  return (
    <span
      style={{
        fontFamily: "var(--font-mono)",
        fontSize: 11,
        fontWeight: 500,
        textTransform: "uppercase",
        letterSpacing: "0.08em",
        color: "var(--text-muted)",
      }}
    >
      {children}
    </span>
  );
}

/* ─── Card ──────────────────────────────────────────────── */

export function Card({
  children,
  title,
  elevated = false,
  style,
}: {
  children: ReactNode;
  title?: string;
  elevated?: boolean;
  style?: CSSProperties;
}) {
  return (
    <section
      style={{
        background: elevated ? "var(--surface-2)" : "var(--surface-1)",
        border: `1px solid ${elevated ? "var(--border-emphasis)" : "var(--border-default)"}`,
        borderRadius: "var(--radius)",
        padding: 20,
        ...style,
      }}
    >
      {title && (
        <h2 style={{ margin: "0 0 12px", fontSize: 15, fontWeight: 600 }}>{title}</h2>
      )}
      {children}
    </section>
  );
}

/* ─── MetricCard ────────────────────────────────────────── */

export function MetricCard({ label, value }: { label: string; value: string | number }) {
  return (
    <div
      style={{
        background: "var(--surface-1)",
        border: "1px solid var(--border-accent)",
        borderRadius: "var(--radius)",
        padding: "14px 16px",
      }}
    >
      <MonoLabel>{label}</MonoLabel>
      <p
        style={{
          margin: "6px 0 0",
          fontSize: 26,
          fontWeight: 600,
          lineHeight: 1,
          color: "var(--accent)",
        }}
      >
        {value}
      </p>
    </div>
  );
}

/* ─── Button ────────────────────────────────────────────── */

type ButtonVariant = "primary" | "secondary";

const buttonStyles: Record<ButtonVariant, CSSProperties> = {
  primary: {
    background: "var(--accent)",
    color: "#000",
    border: "1px solid var(--accent)",
    fontWeight: 600,
  },
  secondary: {
    background: "transparent",
    color: "var(--text-secondary)",
    border: "1px solid var(--border-emphasis)",
  },
};

export function Button({
  variant = "secondary",
  children,
  style,
  ...props
}: ButtonHTMLAttributes<HTMLButtonElement> & {
  variant?: ButtonVariant;
  children: ReactNode;
}) {
  return (
    <button
      style={{
        ...buttonStyles[variant],
        borderRadius: "var(--radius)",
        padding: "8px 16px",
        fontSize: 13,
        fontFamily: "var(--font-mono)",
        textTransform: "uppercase",
        letterSpacing: "0.04em",
        cursor: props.disabled ? "not-allowed" : "pointer",
        opacity: props.disabled ? 0.6 : 1,
        ...style,
      }}
      {...props}
    >
      {children}
    </button>
  );
}

/* ─── NumberInput ───────────────────────────────────────── */

export function NumberInput({
  label,
  ...props
}: Omit<InputHTMLAttributes<HTMLInputElement>, "type"> & { label: string }) {
  return (
    <label style={{ display: "block" }}>
      <MonoLabel>{label}</MonoLabel>
      <input type="number" step={1} style={{ ...fieldStyle, marginTop: 6 }} {...props} />
    </label>
  );
}

/* ─── TextArea ──────────────────────────────────────────── */

export function TextArea({
  label,
  ...props
}: TextareaHTMLAttributes<HTMLTextAreaElement> & { label: string }) {
  return (
    <label style={{ display: "block" }}>
      <MonoLabel>{label}</MonoLabel>
      <textarea
        style={{
          ...fieldStyle,
          marginTop: 6,
          resize: "vertical",
          fontFamily: "var(--font-mono)",
          lineHeight: 1.5,
        }}
        onFocus={(e) => {
          e.currentTarget.style.borderColor = "var(--border-accent)";
        }}
        onBlur={(e) => {
          e.currentTarget.style.borderColor = "var(--border-default)";
        }}
        {...props}
      />
    </label>
  );
}

/* ─── Spinner ───────────────────────────────────────────── */

export function Spinner({ label }: { label: string }) {
  return (
    <span
      role="status"
      style={{ display: "inline-flex", alignItems: "center", gap: 8, fontSize: 13 }}
    >
      <span
        aria-hidden
        style={{
          width: 12,
          height: 12,
          border: "2px solid var(--border-emphasis)",
          borderTopColor: "var(--accent)",
          borderRadius: "50%",
          animation: "spin 0.8s linear infinite",
        }}
      />
      {label}
    </span>
  );
}

/* ─── ScoreBar ──────────────────────────────────────────── */

// Model output is not type-checked, so the score may not be a number.
export function ScoreBar({ label, score, max }: { label: string; score: unknown; max: number }) {
  const value = typeof score === "number" && Number.isFinite(score) ? score : 0;
  const pct = Math.max(0, Math.min(100, (value / max) * 100));
  const color =
    value >= 4 ? "var(--status-pass)" : value >= 3 ? "var(--status-warn)" : "var(--status-fail)";

  return (
    <div style={{ marginBottom: 10 }}>
      <div style={{ display: "flex", justifyContent: "space-between", marginBottom: 4 }}>
        <MonoLabel>{label}</MonoLabel>
        <span style={{ fontFamily: "var(--font-mono)", fontSize: 12, color: "var(--text-secondary)" }}>
          {String(score)} / {max}
        </span>
      </div>
      <div
        style={{ height: 6, background: "var(--surface-3)", borderRadius: 3, overflow: "hidden" }}
      >
        <div
          style={{
            height: "100%",
            width: `${pct}%`,
            background: color,
            borderRadius: 3,
            transition: "width 0.3s ease",
          }}
        />
      </div>
    </div>
  );
}

/* ─── Collapsible ───────────────────────────────────────── */

export function Collapsible({ title, children }: { title: string; children: ReactNode }) {
  const [open, setOpen] = useState(false);
  return (
    <div style={{ border: "1px solid var(--border-default)", borderRadius: "var(--radius)" }}>
      <button
        type="button"
        aria-expanded={open}
        onClick={() => setOpen((prev) => !prev)}
        style={{
          display: "flex",
          alignItems: "center",
          gap: 8,
          width: "100%",
          padding: "10px 14px",
          background: "none",
          border: "none",
          cursor: "pointer",
          color: "var(--text-secondary)",
          fontSize: 12,
          fontFamily: "var(--font-mono)",
          textAlign: "left",
        }}
      >
        <span
          style={{
            display: "inline-block",
            transform: open ? "rotate(90deg)" : "none",
            transition: "transform 0.15s",
            fontSize: 10,
          }}
        >
          &#9654;
        </span>
        {title}
      </button>
      {open && <div style={{ padding: "0 14px 14px" }}>{children}</div>}
    </div>
  );
}
