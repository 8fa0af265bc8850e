import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraServices } from "../../../app/services/infra"
import { Mutex, readDataText } from "../../../lib"
import { StorageArtifactUploader } from "../infra/artifact-uploader.storage"
import { loadGenreCatalog } from "../infra/genre-catalog.file"
import { ProcessInferenceRunner } from "../infra/inference-runner.process"
import { FilePromptStore } from "../infra/prompt-store.file"
import { FileResultStore } from "../infra/result-store.file"
import type { InferenceRunner } from "../model/inference.model"
import type { SongJobId } from "../model/job.model"
import type { LyricsProvider, PromptStore, ProviderName } from "../model/lyrics.model"
import { ArtifactPublisher } from "../services/artifact-publisher"
import { GenerationWorker } from "../services/generation.worker"
import { GenreMatcher } from "../services/genre-matcher"
import { JobQueue } from "../services/job-queue"
import { JobWorkspaces } from "../services/job-workspace"
import { LyricsService } from "../services/lyrics-service"
import { OutputDiscovery } from "../services/output-discovery"
import { RecoveryScanner } from "../services/recovery-scanner"
import { SongJobStore } from "../services/song-job-store"
import { SongOrchestrator } from "../services/song-orchestrator"
import { SongPipeline } from "../services/song-pipeline"
import { createLyricsProviders } from "./providers"

export const SONGS_PATH = "/api/v1/songs"

export type SongServices = {
  orchestrator: SongOrchestrator
  lyrics: LyricsService
  promptStore: PromptStore
  worker: GenerationWorker
}

/** Replacements for the parts that reach outside the process. */
export type SongServiceOverrides = {
  runner?: InferenceRunner
  providers?: ReadonlyMap<ProviderName, LyricsProvider>
}

export async function createSongServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraServices,
  overrides: SongServiceOverrides = {},
): Promise<SongServices> {
  const { logger, clock } = core
  const songs = config.songs

  const [genres, systemPrompt, providers] = await Promise.all([
    loadGenreCatalog(songs.genresFile),
    readDataText("prompts", "lyrics-system.txt"),
    overrides.providers ?? createLyricsProviders(config.lyrics),
  ])

  // Job mutations, snapshot saves and provider swaps share one lock.
  const mutex = new Mutex()

  const genreMatcher = new GenreMatcher(genres, { fallback: songs.fallbackGenre })

  const resultStore = new FileResultStore(
    { logger: logger.child({ component: "result-store" }) },
    { file: songs.resultsFile },
  )
  const store = new SongJobStore({ resultStore, mutex })
  const queue = new JobQueue<SongJobId>()

  const promptStore = new FilePromptStore({
    dir: songs.stateDir,
    defaults: { system: systemPrompt.trim(), genre: "POP" },
  })

  const lyrics = new LyricsService(
    {
      providers,
      promptStore,
      genreMatcher,
      mutex,
      logger: logger.child({ component: "lyrics" }),
    },
    { defaultProvider: config.lyrics.defaultProvider },
  )

  const workspaces = new JobWorkspaces({ outputDir: songs.outputDir })
  const discovery = new OutputDiscovery({ nestedDir: songs.nestedOutputDir })

  const runner =
    overrides.runner ??
    new ProcessInferenceRunner(
      { clock, logger },
      {
        command: config.inference.command,
        commandArgs: config.inference.commandArgs,
        stage1Model: config.inference.stage1Model,
        stage2Model: config.inference.stage2Model,
        killGraceMs: config.inference.killGraceMs,
        ...(config.inference.cwd !== undefined && { cwd: config.inference.cwd }),
        ...(config.inference.timeoutMs !== undefined && { timeoutMs: config.inference.timeoutMs }),
      },
    )

  const storage = infra.objectStorage
  const bucket = config.storage.driver === "none" ? undefined : config.storage.bucket
  const uploader =
    storage && bucket !== undefined
      ? new StorageArtifactUploader({ storage, logger }, { bucket })
      : undefined

  const publisher = new ArtifactPublisher({ logger, ...(uploader && { uploader }) })

  const pipeline = new SongPipeline({
    clock,
    logger: logger.child({ component: "pipeline" }),
    store,
    lyrics,
    genreMatcher,
    workspaces,
    runner,
    discovery,
    publisher,
  })

  const recovery = new RecoveryScanner({
    store,
    discovery,
    workspaces,
    logger: logger.child({ component: "recovery" }),
  })

  const worker = new GenerationWorker({
    queue,
    pipeline,
    logger: logger.child({ component: "worker" }),
  })

  const orchestrator = new SongOrchestrator(
    {
      clock,
      logger: logger.child({ component: "orchestrator" }),
      store,
      queue,
      lyrics,
      genreMatcher,
      recovery,
      ...(storage && { storage }),
    },
    { perJobEstimateSeconds: songs.perJobEstimateSeconds, songsPath: SONGS_PATH },
  )

  return { orchestrator, lyrics, promptStore, worker }
}
