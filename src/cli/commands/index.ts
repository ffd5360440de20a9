import type { CommandDefinition } from "../context";
import { convertCommand, exportCommand } from "./convert";
import { generateCommand } from "./generate";
import { rangesCommand } from "./ranges";
import { removeParameterCommand } from "./remove-parameter";
import { fillTemplateCommand, fillThresholdsCommand } from "./templates";
import { updateKeyCommand, updateUnitCommand } from "./update-key";
import { updateSpecIdCommand } from "./update-spec-id";

export const COMMANDS: Readonly<Record<string, CommandDefinition>> = {
  generate: generateCommand,
  "update-spec-id": updateSpecIdCommand,
  "update-key": updateKeyCommand,
  "update-unit": updateUnitCommand,
  "remove-parameter": removeParameterCommand,
  convert: convertCommand,
  export: exportCommand,
  "fill-template": fillTemplateCommand,
  "fill-thresholds": fillThresholdsCommand,
  ranges: rangesCommand,
};
