import { message } from '@optique/core/message';
import { optional } from '@optique/core/modifiers';
import { option } from '@optique/core/primitives';
import { string } from '@optique/core/valueparser';

export const fileOption = optional(
  option('-f', '--file', string({ metavar: 'FILE' }), {
    description: message`Topology file (default: stackctl.yaml in the working directory)`,
  }),
);

export const projectOption = optional(
  option('-p', '--project', string({ metavar: 'NAME' }), {
    description: message`Project name scoping container, network and volume names`,
  }),
);
