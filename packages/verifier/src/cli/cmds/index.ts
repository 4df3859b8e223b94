import {verifyCommand} from "./verify.js";

export const cmds = [verifyCommand];
