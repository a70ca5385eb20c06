import process from "node:process";

export function detectUnicodeSupport(
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform,
): boolean {
	if (platform !== "win32") {
		return env.TERM !== "linux";
	}

	if (env.CI) return true;
	if (env.WT_SESSION) return true;
	if (env.TERMINUS_SUBLIME) return true;
	if (env.ConEmuTask === "{cmd::Cmder}") return true;
	if (env.TERM_PROGRAM === "Terminus-Sublime") return true;
	if (env.TERM_PROGRAM === "vscode") return true;
	if (env.TERM === "xterm-256color") return true;
	if (env.TERM === "alacritty") return true;
	if (env.TERMINAL_EMULATOR === "JetBrains-JediTerm") return true;

	return false;
}
