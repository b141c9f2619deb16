import { ICommand } from '../types';
import help from './help';
import ingest from './ingest';
import script from './script';
import testcases from './testcases';

export const commands: ReadonlyMap<string, ICommand> = new Map([help, ingest, testcases, script].map((command): [string, ICommand] => [command.name, command]));
