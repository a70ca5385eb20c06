import process from "node:process";

// Rendered prompt frames are asserted as plain text.
process.env.NO_COLOR = "1";
process.env.FORCE_COLOR = "0";
delete process.env.PROJECT_WIZARD_PRESENTER;
delete process.env.PROJECT_WIZARD_NO_INPUT;
