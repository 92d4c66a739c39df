import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { YamlSource } from "../yaml-source"

describeConfigSourceContract({
  name: "YamlSource",
  make: async (cwd) => ({
    source: new YamlSource({ file: "config.yaml", required: true, cwd }),
  }),
  setup: async (cwd) => {
    await fs.writeFile(
      path.join(cwd, "config.yaml"),
      "stage: train\nepochs: 10\nlr: 0.5\nresume: None\n",
    )
  },
  expectedValue: () => ({ stage: "train", epochs: 10, lr: 0.5, resume: null }),
})
