export type Labels = Record<string, string>;

type Kind = "counter" | "gauge";
type Family = { name: string; kind: Kind; help?: string; series: Map<string, { labels: Labels; value: number }> };

/** In-process counters and gauges, rendered in Prometheus text format. */
export class Metrics {
  private readonly families = new Map<string, Family>();

  inc(name: string, by = 1, labels: Labels = {}): void {
    const s = this.series(name, "counter", labels);
    s.value += by;
  }

  set(name: string, value: number, labels: Labels = {}): void {
    const s = this.series(name, "gauge", labels);
    s.value = value;
  }

  describe(name: string, kind: Kind, help: string): void {
    this.family(name, kind).help = help;
  }

  /** Current value of one series; 0 when it was never touched. */
  value(name: string, labels: Labels = {}): number {
    return this.families.get(name)?.series.get(labelKey(labels))?.value ?? 0;
  }

  render(): string {
    const lines: string[] = [];
    for (const f of this.families.values()) {
      if (f.help) lines.push(`# HELP ${f.name} ${f.help}`);
      lines.push(`# TYPE ${f.name} ${f.kind}`);
      for (const { labels, value } of f.series.values()) {
        lines.push(`${f.name}${renderLabels(labels)} ${value}`);
      }
    }
    return lines.join("\n") + "\n";
  }

  private family(name: string, kind: Kind): Family {
    let f = this.families.get(name);
    if (!f) {
      f = { name, kind, series: new Map() };
      this.families.set(name, f);
    } else if (f.kind !== kind) {
      throw new Error(`metric ${name} is a ${f.kind}, not a ${kind}`);
    }
    return f;
  }

  private series(name: string, kind: Kind, labels: Labels) {
    const f = this.family(name, kind);
    const key = labelKey(labels);
    let s = f.series.get(key);
    if (!s) {
      s = { labels, value: 0 };
      f.series.set(key, s);
    }
    return s;
  }
}

function labelKey(labels: Labels): string {
  return Object.keys(labels)
    .sort()
    .map(k => `${k}=${labels[k]}`)
    .join(",");
}

function renderLabels(labels: Labels): string {
  const keys = Object.keys(labels).sort();
  if (!keys.length) return "";
  const esc = (v: string) => v.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
  return `{${keys.map(k => `${k}="${esc(labels[k] ?? "")}"`).join(",")}}`;
}

/** Register HELP text for the series the host emits. */
export function describeNotifierMetrics(m: Metrics): Metrics {
  m.describe("polls_total", "counter", "Poll ticks run");
  m.describe("poll_failures_total", "counter", "Per-project detection failures");
  m.describe("loop_failures_total", "counter", "Poll loop failures outside a detector");
  m.describe("broadcasts_total", "counter", "Change notifications broadcast");
  m.describe("deliveries_total", "counter", "Frames enqueued for subscribers");
  m.describe("dropped_total", "counter", "Frames dropped on full subscriber queues");
  m.describe("subscribers", "gauge", "Open change streams");
  m.describe("tenants", "gauge", "Projects with at least one open stream");
  m.describe("detectors", "gauge", "Projects with a registered change detector");
  return m;
}

export const metrics = describeNotifierMetrics(new Metrics());
