const OPTIONS = [
  { flag: "-d <duration>", description: "Delay between requests to each target, e.g. 500ms, 10s (default: 10s). A bare number is seconds." },
  { flag: "-f <number>", description: "Failed requests per target before it stops (default: 10)." },
  { flag: "-n <number>", description: "Samples per target; 0 runs until interrupted (default: 0)." },
  { flag: "-t <duration>", description: "Timeout for a single request (default: 15s)." },
  { flag: "-j", description: "Print samples and summaries as JSON records instead of tab-separated text." },
  { flag: "-A <ms>", description: "Alert when the response time exceeds this many milliseconds (default: off)." },
  { flag: "-M <duration>", description: "Minimum time between two alerts, across all targets (default: 300s)." },
  { flag: "-m <path>", description: "Publish response times to a Prometheus textfile." },
  { flag: "-W <url>", description: "POST every sample as JSON to this https webhook." },
  { flag: "--config <path>", description: "Read settings and targets from a YAML file." },
  { flag: "-q", description: "Only log warnings and errors." },
  { flag: "-v, -V", description: "Verbose, more verbose logging." },
  { flag: "--version", description: "Print the version and exit." },
  { flag: "-h, --help", description: "Show this help message and exit." },
] as const;

const ENVIRONMENT = [
  { name: "PERFPROBE_URL", description: "Space separated targets, added to those on the command line." },
  { name: "PERFPROBE_LOCATION", description: "Location reported with samples and metrics (default: host name)." },
  { name: "RESPONSE_THRESHOLD", description: "Alert threshold in milliseconds when -A is not given." },
  { name: "HTTP_JSON_WEBHOOK", description: "Webhook URL when -W is not given." },
  { name: "TWILIO_ACCOUNT_SID", description: "Twilio account used for SMS alerts." },
  { name: "TWILIO_AUTH_TOKEN", description: "Twilio auth token." },
  { name: "TWILIO_SMS_SENDER", description: "Sender number registered with Twilio." },
  { name: "TWILIO_SMS_RECEIVERS", description: "Space separated numbers to alert." },
] as const;

const EXAMPLES = [
  "perfprobe -n 5 -d 2s https://example.com/",
  "perfprobe -j -A 250 -M 10m https://api.example.com/health https://www.example.com/",
  "perfprobe --config ./perfprobe.yaml -m /var/lib/node_exporter/perfprobe.prom",
] as const;

function formatColumns(rows: readonly { left: string; right: string }[], padding = 2): string {
  const leftWidth = rows.reduce((max, row) => Math.max(max, row.left.length), 0);

  return rows
    .map((row) => {
      const left = row.left.padEnd(leftWidth + padding, " ");
      return `${left}${row.right}`.trimEnd();
    })
    .join("\n");
}

export function renderCliHelp(): string {
  const sections: string[] = [
    "perfprobe: measure DNS, TCP, TLS and reply times of HTTP endpoints",
    "",
    "Usage:",
    "  perfprobe [options] URL ...",
    "",
    "Every URL is probed in parallel until -n samples were taken, -f requests",
    "failed, or the process is interrupted.",
    "",
    "Options:",
    formatColumns(OPTIONS.map(({ flag, description }) => ({ left: `  ${flag}`, right: description }))),
    "",
    "Environment:",
    formatColumns(
      ENVIRONMENT.map(({ name, description }) => ({ left: `  ${name}`, right: description })),
    ),
    "",
    "Examples:",
    ...EXAMPLES.map((example) => `  $ ${example}`),
  ];

  return `${sections.join("\n")}\n`;
}
