import { previousDay, startOfDay } from "@/dates"
import type { IngestProgress, IngestSummary } from "@/types"
import type { Logger } from "@/logger"
import type { CommitRepository } from "@db/commits"
import type { Classifier } from "@services/classifier"
import { LogParser, parseLogStream } from "@services/log-parser"
import type { IGitService } from "@services/types"

export interface IngestionOptions {
  git: IGitService
  commits: CommitRepository
  classify: Classifier
  logger: Logger
  /** Only ingest commits authored on or after this "YYYY-MM-DD" date (UTC). */
  since?: string
}

/**
 * Streams a repository's history into the store: one `git log` read, each
 * commit parsed, classified and upserted before the next is read.
 */
export class IngestionService {
  private git: IGitService
  private commits: CommitRepository
  private classify: Classifier
  private logger: Logger
  private since?: string

  constructor(options: IngestionOptions) {
    this.git = options.git
    this.commits = options.commits
    this.classify = options.classify
    this.logger = options.logger
    this.since = options.since
  }

  /**
   * Runs one ingestion pass.
   *
   * Malformed commits and commits whose write fails are counted and logged;
   * neither stops the run. A git failure rejects with GitError. When `signal`
   * is aborted the run stops after the commit in progress.
   */
  async run(
    onProgress: (progress: IngestProgress) => void,
    signal?: AbortSignal,
  ): Promise<IngestSummary> {
    const summary: IngestSummary = {
      parsed: 0,
      written: 0,
      unchanged: 0,
      skipped: 0,
      failed: 0,
      fileRowsWritten: 0,
    }
    const parser = new LogParser({
      onSkip: (reason) => this.logger.debug(`skipped commit: ${reason}`),
    })

    this.logger.debug(
      this.since ? `reading history since ${this.since}` : "reading history",
    )

    // git's --since compares committer dates at local midnight, so it only
    // narrows the read; the author-date cut is applied here in UTC.
    const cutoff = this.since ? startOfDay(this.since) : undefined
    const lines = this.git.streamLog({
      since: this.since ? previousDay(this.since) : undefined,
    })
    for await (const commit of parseLogStream(lines, parser)) {
      if (cutoff && commit.authoredAt < cutoff) {
        this.logger.debug(
          `commit ${commit.hash.slice(0, 7)} authored before ${this.since}`,
        )
        continue
      }
      summary.parsed++
      const { isFix, tags } = this.classify(commit.message)

      try {
        const result = this.commits.upsertCommit({
          ...commit,
          isFix,
          errorTags: tags,
        })
        if (result.status === "written") {
          summary.written++
          summary.fileRowsWritten += result.fileRows
        } else {
          summary.unchanged++
        }
      } catch (err) {
        summary.failed++
        const message = err instanceof Error ? err.message : String(err)
        this.logger.warn(
          `failed to store commit ${commit.hash.slice(0, 7)}: ${message}`,
        )
      }

      summary.skipped = parser.skipped
      onProgress({
        phase: "reading",
        parsed: summary.parsed,
        skipped: summary.skipped,
        failed: summary.failed,
        currentHash: commit.hash,
      })

      if (signal?.aborted) {
        this.logger.info("ingestion aborted")
        break
      }
    }

    summary.skipped = parser.skipped
    onProgress({
      phase: "done",
      parsed: summary.parsed,
      skipped: summary.skipped,
      failed: summary.failed,
    })
    this.logger.info(
      `ingested ${summary.parsed} commits (${summary.written} written, ${summary.unchanged} unchanged, ${summary.skipped} skipped, ${summary.failed} failed)`,
    )
    return summary
  }
}
