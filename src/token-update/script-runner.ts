/**
 * Runs the operator's token update script.
 *
 * The script logs in to StoredSafe and rewrites the rc file as a side
 * effect. It is run through /bin/sh with no arguments; its output is kept
 * for diagnostics only.
 *
 * The script runs in its own process group. On timeout the whole group is
 * signalled, and the result is reported only once every process holding
 * its output pipes has exited, so nothing it started can still write the
 * rc file after the caller releases the lock.
 */

import { spawn } from "node:child_process";

export type ScriptResult =
	| { kind: "exited"; exitCode: number | null; signal: NodeJS.Signals | null; stdout: string; stderr: string }
	| { kind: "timed-out"; timeoutMs: number; stdout: string; stderr: string }
	| { kind: "spawn-error"; error: Error };

export type ScriptRunner = (scriptPath: string, timeoutMs: number) => Promise<ScriptResult>;

export interface ScriptRunOptions {
	/** Delay between SIGTERM and SIGKILL, and between SIGKILL and giving up on the pipes. */
	killGraceMs?: number;
}

const SHELL = "/bin/sh";

const DEFAULT_KILL_GRACE_MS = 2000;

export function runTokenUpdateScript(
	scriptPath: string,
	timeoutMs: number,
	options: ScriptRunOptions = {},
): Promise<ScriptResult> {
	const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

	return new Promise((resolve) => {
		let settled = false;
		let timedOut = false;
		const timers: Array<ReturnType<typeof setTimeout>> = [];
		let stdout = "";
		let stderr = "";

		const settle = (result: ScriptResult) => {
			if (settled) return;
			settled = true;
			for (const timer of timers) clearTimeout(timer);
			resolve(result);
		};

		const timedOutResult = (): ScriptResult => ({ kind: "timed-out", timeoutMs, stdout, stderr });

		const proc = spawn(SHELL, [scriptPath], {
			stdio: ["ignore", "pipe", "pipe"],
			detached: true,
		});

		const killGroup = (signal: NodeJS.Signals) => {
			if (proc.pid === undefined) return;
			try {
				process.kill(-proc.pid, signal);
			} catch (err) {
				// ESRCH: the group is already gone.
				if ((err as NodeJS.ErrnoException).code !== "ESRCH") {
					proc.kill(signal);
				}
			}
		};

		proc.stdout.on("data", (data: Buffer) => {
			stdout += data.toString();
		});

		proc.stderr.on("data", (data: Buffer) => {
			stderr += data.toString();
		});

		proc.on("error", (error) => {
			settle({ kind: "spawn-error", error });
		});

		// "close" waits for the pipes, which descendants of the script inherit.
		proc.on("close", (exitCode, signal) => {
			settle(timedOut ? timedOutResult() : { kind: "exited", exitCode, signal, stdout, stderr });
		});

		if (timeoutMs > 0) {
			timers.push(
				setTimeout(() => {
					if (settled) return;
					timedOut = true;
					killGroup("SIGTERM");
					timers.push(
						setTimeout(() => {
							killGroup("SIGKILL");
							// A descendant that left the group can hold the pipes forever.
							timers.push(
								setTimeout(() => {
									proc.stdout.destroy();
									proc.stderr.destroy();
									settle(timedOutResult());
								}, killGraceMs),
							);
						}, killGraceMs),
					);
				}, timeoutMs),
			);
		}
	});
}
