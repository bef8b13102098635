import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { runTokenUpdateScript } from "../../src/token-update/script-runner.js";
import { sleep } from "../../src/utils.js";

describe("runTokenUpdateScript with a real shell", () => {
	let dir: string;
	let rcFile: string;
	let scriptPath: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "storedsafe-script-"));
		rcFile = path.join(dir, "client.rc");
		scriptPath = path.join(dir, "login.sh");
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("captures output of a script that exits", async () => {
		fs.writeFileSync(scriptPath, "echo logged in\necho oops >&2\nexit 3\n");

		await expect(runTokenUpdateScript(scriptPath, 5000)).resolves.toEqual({
			kind: "exited",
			exitCode: 3,
			signal: null,
			stdout: "logged in\n",
			stderr: "oops\n",
		});
	});

	it("stops the script's child processes on timeout", async () => {
		fs.writeFileSync(scriptPath, `sleep 1\necho token:late > '${rcFile}'\n`);

		const result = await runTokenUpdateScript(scriptPath, 200, { killGraceMs: 500 });
		expect(result.kind).toBe("timed-out");

		await sleep(1500);
		expect(fs.existsSync(rcFile)).toBe(false);
	}, 10_000);

	it("stops a backgrounded child of the script on timeout", async () => {
		fs.writeFileSync(scriptPath, `(sleep 1; echo token:late > '${rcFile}') &\nsleep 5\n`);

		const result = await runTokenUpdateScript(scriptPath, 200, { killGraceMs: 500 });
		expect(result.kind).toBe("timed-out");

		await sleep(1500);
		expect(fs.existsSync(rcFile)).toBe(false);
	}, 10_000);

	it("kills a script that ignores SIGTERM before reporting the timeout", async () => {
		fs.writeFileSync(scriptPath, `trap '' TERM\nsleep 1\necho token:late > '${rcFile}'\n`);

		const startedAt = Date.now();
		const result = await runTokenUpdateScript(scriptPath, 200, { killGraceMs: 300 });
		const elapsed = Date.now() - startedAt;

		expect(result.kind).toBe("timed-out");
		expect(elapsed).toBeGreaterThanOrEqual(450);

		await sleep(1200);
		expect(fs.existsSync(rcFile)).toBe(false);
	}, 10_000);
});
