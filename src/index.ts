import { AxiosAdapter } from 'axios'

import BrowserFunc, { PageRenderer } from './browser/BrowserFunc'

import { Logger, LogFn } from './util/Logger'
import Util from './util/Utils'
import AxiosClient from './util/Axios'
import { LogBuffer } from './util/LogBuffer'
import { TaskRegistry } from './util/TaskRegistry'

import { ContentExtractor } from './functions/ContentExtractor'
import { ResourceIngestion } from './functions/ResourceIngestion'
import { AudioTranscriber } from './functions/resources/Audio'
import { ChatGateway, LlmGateway, SpeechGateway } from './functions/LlmGateway'
import { SolutionPlanner } from './functions/SolutionPlanner'
import { Sandbox } from './functions/Sandbox'
import { SolutionExecutor } from './functions/SolutionExecutor'
import { AnswerSubmitter } from './functions/AnswerSubmitter'
import { QuestionPipeline } from './functions/QuestionPipeline'
import { ChainDriver } from './functions/ChainDriver'

import { Config } from './interface/Config'
import { ChainResult, TaskRecord } from './interface/Chain'
import { SolveRequest, StudentCredentials } from './interface/Submission'
import { AuthorizationError, errorMessage } from './errors'

/** Replaceable collaborators; tests swap the network-facing ones for in-process fakes */
export interface QuizChainDeps {
    adapter?: AxiosAdapter
    renderer?: PageRenderer
    gateway?: ChatGateway
    transcriber?: SpeechGateway
    now?: () => number
}

// Main bot class
export class QuizChainBot {
    public config: Config
    public logger: Logger
    public log: LogFn
    public utils: Util
    public axios: AxiosClient
    public logs: LogBuffer
    public tasks: TaskRegistry
    public browser: {
        func: PageRenderer
    }
    public llm: ChatGateway
    public audio: AudioTranscriber
    public sandbox: Sandbox
    public now: () => number

    public extractor: ContentExtractor = new ContentExtractor(this)
    public ingestion: ResourceIngestion = new ResourceIngestion(this)
    public planner: SolutionPlanner = new SolutionPlanner(this)
    public executor: SolutionExecutor = new SolutionExecutor(this)
    public submitter: AnswerSubmitter = new AnswerSubmitter(this)
    public pipeline: QuestionPipeline = new QuestionPipeline(this)
    public chain: ChainDriver = new ChainDriver(this)

    constructor(config: Config, deps: QuizChainDeps = {}) {
        this.config = config
        this.now = deps.now ?? Date.now

        this.logs = new LogBuffer(config.server.logBufferSize)
        this.logger = new Logger(config.logging, [config.student.secret, config.llm.token])
        this.logger.addSink(this.logs)
        this.log = this.logger.log

        this.utils = new Util()
        this.axios = new AxiosClient({ adapter: deps.adapter })
        this.tasks = new TaskRegistry(config.server.taskRetention)

        const gateway = new LlmGateway(this.axios, config.llm, config.transcription)
        this.llm = deps.gateway ?? gateway
        this.audio = new AudioTranscriber(config.transcription, deps.transcriber ?? gateway, this.log)
        this.sandbox = new Sandbox(config.sandbox, this.log)

        this.browser = {
            func: deps.renderer ?? new BrowserFunc(this)
        }
    }

    credentials(): StudentCredentials {
        return { email: this.config.student.email, secret: this.config.student.secret }
    }

    /**
     * Secret must match exactly, email case-insensitively. Throws AuthorizationError otherwise.
     */
    authorize(request: StudentCredentials): void {
        if (request.secret !== this.config.student.secret) {
            this.log('main', 'AUTH', `Invalid secret for ${request.email}`, 'warn')
            throw new AuthorizationError('Invalid secret')
        }
        if (request.email.trim().toLowerCase() !== this.config.student.email.trim().toLowerCase()) {
            this.log('main', 'AUTH', `Email mismatch: ${request.email}`, 'warn')
            throw new AuthorizationError('Email mismatch')
        }
    }

    async runChain(url: string, scope = 'main', credentials: StudentCredentials = this.credentials()): Promise<ChainResult> {
        return this.chain.run(url, credentials, scope)
    }

    /**
     * Registers a task and runs its chain in the background. Returns immediately.
     */
    startTask(request: SolveRequest): TaskRecord {
        const task = this.tasks.create(request.url, new Date(this.now()))
        this.log('main', 'SERVER', `Task ${task.id} received for ${request.url}`)

        this.runTask(task.id, request).catch((error: unknown) => {
            this.tasks.fail(task.id, errorMessage(error), new Date(this.now()))
            this.log(task.id, 'TASK', `Task failed: ${errorMessage(error)}`, 'error')
        })

        return task
    }

    private async runTask(id: string, request: SolveRequest): Promise<void> {
        this.tasks.markSolving(id)
        const result = await this.chain.run(request.url, { email: request.email, secret: request.secret }, id)
        this.tasks.finish(id, result, new Date(this.now()))
        this.log(id, 'TASK', `Task finished: ${result.status} after ${result.questionCount} question(s)`, result.status === 'Failed' ? 'warn' : 'log')
    }

    close(): void {
        this.tasks.dispose()
    }
}
