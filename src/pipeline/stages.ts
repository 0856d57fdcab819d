/**
 * Builder and runtime stage definitions.
 *
 * Layer ordering: stable layers first, frequently changing last. Manifests
 * are copied and installed before the source tree so that source-only
 * changes reuse the dependency layer.
 */

import {
  getNumericIdentity,
  getOwner,
  getVenvBinPath,
  getVenvPath,
  type PipelineConfig,
} from "../config.js";
import {
  BUILDER_STAGE,
  INSTALLER_PATH,
  LABEL_PREFIX,
  PACKAGING_TOOLS,
  RUNTIME_STAGE,
  UV_INSTALL_DIR,
  VERSION,
} from "../constants.js";
import type { ManifestSet } from "../manifest.js";
import { manifestPaths } from "../manifest.js";
import { type BuildStep, type ImageStage, PipelineState } from "./types.js";

/** Command for the locked sync step, chosen by what the context declares. */
export function getSyncCommand(manifests: ManifestSet): string {
  // A project descriptor makes the lock file authoritative: --locked fails
  // when uv.lock is missing or out of date instead of re-resolving.
  if (manifests.hasDescriptor) {
    return "uv sync --locked";
  }
  // Requirements-only projects have no lock to sync; verify the installed set.
  return "python -m pip check";
}

/**
 * Builder stage: system prerequisites, uv, packaging tools, dependencies,
 * source, locked sync. Never shipped.
 */
export function createBuilderStage(config: PipelineConfig, manifests: ManifestSet): ImageStage {
  const venvPath = getVenvPath(config);

  const steps: BuildStep[] = [
    {
      id: "system-deps",
      kind: "run",
      description: "System build prerequisites (version control, C/C++ toolchain)",
      dependsOn: [],
      command:
        "apt-get update && apt-get install -y --no-install-recommends " +
        `${config.systemPackages.join(" ")} && rm -rf /var/lib/apt/lists/*`,
    },
    {
      id: "fetch-installer",
      kind: "add",
      description: "Fetch the uv installer script",
      dependsOn: ["system-deps"],
      source: config.installerUrl,
      destination: INSTALLER_PATH,
    },
    {
      id: "run-installer",
      kind: "run",
      description: "Install uv and remove the installer in the same layer",
      dependsOn: ["fetch-installer"],
      command: `UV_INSTALL_DIR=${UV_INSTALL_DIR} sh ${INSTALLER_PATH} && rm ${INSTALLER_PATH}`,
    },
    {
      id: "venv-env",
      kind: "env",
      description: "Point pip, uv and PATH at the project virtual environment",
      dependsOn: ["run-installer"],
      vars: {
        VIRTUAL_ENV: venvPath,
        UV_PROJECT_ENVIRONMENT: venvPath,
        PATH: `${getVenvBinPath(config)}:$PATH`,
      },
    },
    {
      id: "create-venv",
      kind: "run",
      description: "Create the project virtual environment",
      dependsOn: ["venv-env"],
      command: `python -m venv ${venvPath}`,
    },
    {
      id: "upgrade-tools",
      kind: "run",
      description: "Upgrade packaging tools before building anything from source",
      dependsOn: ["create-venv"],
      command: `pip install --upgrade ${PACKAGING_TOOLS.join(" ")}`,
    },
    {
      id: "copy-manifests",
      kind: "copy",
      description: "Copy dependency manifests only (keeps the install layer cacheable)",
      dependsOn: ["upgrade-tools"],
      sources: manifestPaths(config).map(({ path }) => `${path}*`),
      destination: "./",
    },
    {
      id: "install-deps",
      kind: "run",
      description: "Install declared dependencies",
      dependsOn: ["copy-manifests"],
      command: `pip install --no-cache-dir -r ${config.requirements}`,
      reaches: PipelineState.DEPS_INSTALLED,
    },
    {
      id: "copy-source",
      kind: "copy",
      description: "Copy the full source tree",
      dependsOn: ["install-deps"],
      sources: ["."],
      destination: ".",
      reaches: PipelineState.SOURCE_COPIED,
    },
    {
      id: "sync-locked",
      kind: "run",
      description: "Materialize the environment from the lock file",
      dependsOn: ["copy-source"],
      command: getSyncCommand(manifests),
      reaches: PipelineState.ENV_SYNCED,
    },
  ];

  return Object.freeze({
    name: BUILDER_STAGE,
    baseImage: config.builderImage,
    workdir: config.workdir,
    steps: Object.freeze(steps),
    shipped: false,
    baseState: PipelineState.BASE_BUILDER,
  });
}

/** Labels stamped on the shipped image. */
export function getImageLabels(config: PipelineConfig, manifestHash: string): Record<string, string> {
  const labels: Record<string, string> = {
    [`${LABEL_PREFIX}.version`]: VERSION,
    [`${LABEL_PREFIX}.manifest-hash`]: manifestHash,
  };
  for (const port of config.ports) {
    const description = config.portLabels[port];
    if (description !== undefined) {
      labels[`${LABEL_PREFIX}.port.${port}`] = description;
    }
  }
  return { ...labels, ...config.labels };
}

/**
 * Runtime stage: non-root identity, artifacts copied from the builder,
 * PATH wired to the bundled environment.
 */
export function createRuntimeStage(config: PipelineConfig, manifestHash: string): ImageStage {
  const { identity, workdir } = config;
  const owner = getOwner(identity);
  const venvPath = getVenvPath(config);

  const steps: BuildStep[] = [
    {
      id: "create-identity",
      kind: "run",
      description: "Non-root system group and user",
      dependsOn: [],
      command:
        `groupadd --system --gid ${identity.gid} ${identity.group} && ` +
        `useradd --system --uid ${identity.uid} --gid ${identity.gid} --no-create-home ${identity.user}`,
      reaches: PipelineState.USER_CREATED,
    },
    {
      id: "own-workdir",
      kind: "run",
      description: "Hand the empty working directory to the runtime user",
      dependsOn: ["create-identity"],
      command: `chown ${owner} ${workdir}`,
      reaches: PipelineState.OWNERSHIP_SET,
    },
    {
      id: "switch-identity",
      kind: "user",
      description: "Drop privileges for every later step and the running process",
      dependsOn: ["own-workdir"],
      user: getNumericIdentity(identity),
      reaches: PipelineState.IDENTITY_SWITCHED,
    },
    {
      id: "copy-artifacts",
      kind: "copy",
      description: "Application and environment from the builder",
      dependsOn: ["switch-identity"],
      from: BUILDER_STAGE,
      chown: owner,
      sources: [workdir],
      destination: workdir,
      reaches: PipelineState.ARTIFACTS_COPIED,
    },
    {
      id: "copy-venv",
      kind: "copy",
      description: "Virtual environment at its fixed path",
      dependsOn: ["copy-artifacts"],
      from: BUILDER_STAGE,
      chown: owner,
      sources: [venvPath],
      destination: venvPath,
    },
    {
      id: "configure-path",
      kind: "env",
      description: "Resolve commands from the bundled environment first",
      dependsOn: ["copy-venv"],
      vars: {
        VIRTUAL_ENV: venvPath,
        PATH: `${getVenvBinPath(config)}:$PATH`,
        ...config.env,
      },
      reaches: PipelineState.PATH_CONFIGURED,
    },
    {
      id: "recopy-source",
      kind: "copy",
      description: "Source tree, matching what the dependencies were installed against",
      dependsOn: ["configure-path"],
      chown: owner,
      sources: ["."],
      destination: workdir,
      reaches: PipelineState.SOURCE_RECOPIED,
    },
    {
      id: "expose-ports",
      kind: "expose",
      description: "Ports the service process is expected to bind",
      dependsOn: ["recopy-source"],
      ports: config.ports,
    },
    {
      id: "labels",
      kind: "label",
      description: "Image metadata",
      dependsOn: ["expose-ports"],
      labels: getImageLabels(config, manifestHash),
    },
  ];

  if (config.command) {
    steps.push({
      id: "command",
      kind: "cmd",
      description: "Default service command",
      dependsOn: ["labels"],
      argv: config.command,
    });
  }

  return Object.freeze({
    name: RUNTIME_STAGE,
    baseImage: config.runtimeImage,
    workdir,
    steps: Object.freeze(steps),
    shipped: true,
    baseState: PipelineState.BASE_RUNTIME,
  });
}
