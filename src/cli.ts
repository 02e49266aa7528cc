import { Command } from "commander";
import { doctorCommand } from "./commands/doctor.js";
import { installCommand } from "./commands/install.js";
import { selfUpdateCommand } from "./commands/self-update.js";
import { statusCommand } from "./commands/status.js";
import { uninstallCommand } from "./commands/uninstall.js";
import { updateCommand } from "./commands/update.js";
import { VERSION } from "./version.js";

const program = new Command();

program
	.name("skillrig")
	.description("Skill, agent and hook installer for AI coding assistants")
	.version(VERSION);

program.addCommand(installCommand);
program.addCommand(updateCommand);
program.addCommand(selfUpdateCommand);
program.addCommand(uninstallCommand);
program.addCommand(doctorCommand);
program.addCommand(statusCommand);
program.addCommand(
	new Command("version").description("Print the skillrig version").action(() => {
		console.log(VERSION);
	}),
);

program.showHelpAfterError(true);

program.action(() => {
	program.outputHelp();
});

await program.parseAsync();
