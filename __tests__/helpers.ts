import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";

export const exclusionsPath = fileURLToPath(new URL("../config/exclusions.json", import.meta.url));

export const readFixture = (name: string) =>
  fs.readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), "utf-8");

export const makeTempDir = () => fs.mkdtempSync(path.join(os.tmpdir(), "headline-harvest-"));
