// Detect color support: Windows cmd.exe without virtual terminal support gets no colors.
// Windows Terminal, PowerShell 7+, and all Unix terminals support ANSI.
const supportsColor =
	process.env.NO_COLOR == null &&
	(process.platform !== "win32" ||
		!!process.env.WT_SESSION || // Windows Terminal
		!!process.env.TERM_PROGRAM || // VS Code, etc.
		process.env.TERM === "xterm" ||
		process.env.TERM === "xterm-256color");

const c = (code: string) => (supportsColor ? code : "");

const RESET = c("\x1b[0m");
const BOLD = c("\x1b[1m");
const DIM = c("\x1b[2m");
const UNDERLINE = c("\x1b[4m");
const GREEN = c("\x1b[32m");
const YELLOW = c("\x1b[33m");
const CYAN = c("\x1b[36m");
const RED = c("\x1b[31m");
const MAGENTA = c("\x1b[35m");
const WHITE = c("\x1b[37m");

// ─── Inline colour helpers (exported for use in prompts & messages) ────────

/** Bold text. */
export function bold(text: string): string {
	return `${BOLD}${text}${RESET}`;
}

/** Dim/muted text. */
export function dim(text: string): string {
	return `${DIM}${text}${RESET}`;
}

/** Cyan text (info, highlights). */
export function cyan(text: string): string {
	return `${CYAN}${text}${RESET}`;
}

/** Magenta text (secrets, keys). */
export function magenta(text: string): string {
	return `${MAGENTA}${text}${RESET}`;
}

/** Underlined cyan — for URLs. */
export function url(text: string): string {
	return `${UNDERLINE}${CYAN}${text}${RESET}`;
}

/** Yellow — for CLI commands and paths. */
export function cmd(text: string): string {
	return `${YELLOW}${text}${RESET}`;
}

/** Cyan bold — for variable/output names. */
export function label(text: string): string {
	return `${CYAN}${BOLD}${text}${RESET}`;
}

/** Green bold — for domain names. */
export function host(text: string): string {
	return `${GREEN}${BOLD}${text}${RESET}`;
}

// ─── Output functions ──────────────────────────────────────────────────────

/** Print the welcome banner. */
export function banner(): void {
	console.log("");
	console.log(`${BOLD}${CYAN}  ╔═══════════════════════════════════════╗${RESET}`);
	console.log(`${BOLD}${CYAN}  ║${RESET}${BOLD}${WHITE}   ⚡  Supabase on DigitalOcean ${DIM}(sbdo)${RESET}${BOLD}${CYAN} ║${RESET}`);
	console.log(`${BOLD}${CYAN}  ╚═══════════════════════════════════════╝${RESET}`);
	console.log(`${DIM}  Self-hosted Supabase via Packer + Terraform${RESET}`);
	console.log("");
}

/** Print a numbered step header. */
export function stepHeader(step: number, total: number, title: string): void {
	console.log("");
	console.log(`${BOLD}${CYAN}  ━━━ ${WHITE}Step ${YELLOW}${step}${WHITE}/${DIM}${total}${RESET}${BOLD}${WHITE} — ${CYAN}${title} ${CYAN}━━━${RESET}`);
	console.log("");
}

/** Print a success message with a checkmark. */
export function success(msg: string): void {
	console.log(`  ${GREEN}✔${RESET} ${msg}`);
}

/** Print a skip message. */
export function skip(msg: string): void {
	console.log(`  ${DIM}⊘ ${msg}${RESET}`);
}

/** Print an info message. */
export function info(msg: string): void {
	console.log(`  ${CYAN}ℹ${RESET} ${msg}`);
}

/** Print a warning message. */
export function warn(msg: string): void {
	console.log(`  ${YELLOW}⚠${RESET} ${YELLOW}${msg}${RESET}`);
}

/** Print an error message. */
export function error(msg: string): void {
	console.log(`  ${RED}✖${RESET} ${RED}${msg}${RESET}`);
}

/** Print a key=value pair for summaries. */
export function keyValue(key: string, value: string): void {
	console.log(`  ${DIM}${key}:${RESET} ${BOLD}${WHITE}${value}${RESET}`);
}

/** Print rows as aligned columns under an underlined header. */
export function table(headers: string[], rows: string[][]): void {
	const widths = headers.map((h, col) => rows.reduce((w, row) => Math.max(w, (row[col] ?? "").length), h.length));
	const line = (cells: string[]) =>
		cells
			.map((cell, col) => cell.padEnd(widths[col] ?? 0))
			.join("   ")
			.trimEnd();

	console.log(`  ${BOLD}${line(headers)}${RESET}`);
	console.log(`  ${DIM}${widths.map((w) => "─".repeat(w)).join("   ")}${RESET}`);
	for (const row of rows) {
		console.log(`  ${line(row)}`);
	}
}

/** Print the closing title, underlined. */
export function complete(title: string): void {
	console.log("");
	console.log(`  ${BOLD}${GREEN}✔ ${title}${RESET}`);
	console.log(`  ${GREEN}${"═".repeat(title.length + 2)}${RESET}`);
	console.log("");
}
