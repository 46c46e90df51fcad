import { log } from "utils";
import {
    EXIT_SUCCESS,
    EXIT_TERMINATION_CALLBACKS_THREW,
    EXIT_UNCAUGHT_EXCEPTION,
    EXIT_UNHANDLED_REJECTION,
} from "./exit-codes";

//
// Set to true after the termination handlers have been initialized.
//
let terminationHandlersInitialized = false;

//
// The type of a callback that releases resources before the process ends.
// The exit code is passed to indicate whether the process is exiting successfully (0) or with an error (non-zero).
//
export type TerminationCallback = (exitCode: number) => void | Promise<void>;

//
// Callbacks that have been registered and not yet invoked.
//
let terminationCallbacks: TerminationCallback[] = [];

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

//
// Invokes the registered termination callbacks with the given exit code.
// Each callback runs at most once, even if termination is triggered again while they run.
//
export async function invokeTerminationCallbacks(exitCode: number): Promise<void> {
    const callbacks = terminationCallbacks;
    terminationCallbacks = [];
    for (const callback of callbacks) {
        await callback(exitCode);
    }
}

//
// Trigger program termination with a specific exit code.
// Invokes the termination callbacks registered with `registerTerminationCallback`.
//
export async function exit(code: number): Promise<never> {
    try {
        await invokeTerminationCallbacks(code);
    }
    catch (err: unknown) {
        log.exception('Error during exit termination callbacks.', toError(err));
        code = EXIT_TERMINATION_CALLBACKS_THREW;
    }

    return process.exit(code);
}

//
// Register a callback function to be called when the process is about to exit.
//
export function registerTerminationCallback(callback: TerminationCallback): void {
    initializeTerminationHandlers();
    terminationCallbacks.push(callback);
}

//
// Runs the callbacks and ends the process, whatever the callbacks do.
//
async function terminate(exitCode: number): Promise<void> {
    try {
        await invokeTerminationCallbacks(exitCode);
    }
    catch (err: unknown) {
        log.exception('Error during shutdown.', toError(err));
        exitCode = EXIT_TERMINATION_CALLBACKS_THREW;
    }
    finally {
        process.exit(exitCode);
    }
}

//
// Initializes the termination handlers for the process.
//
function initializeTerminationHandlers(): void {
    if (terminationHandlersInitialized) {
        // Already initialized, no need to do it again.
        return;
    }

    //
    // Listen for the SIGTERM signal (graceful shutdown request)
    //
    process.on('SIGTERM', async () => {
        log.verbose('SIGTERM received. Shutting down gracefully...');
        await terminate(EXIT_SUCCESS);
    });

    //
    // Listen for the SIGINT signal (Ctrl+C)
    //
    process.on('SIGINT', async () => {
        log.verbose('SIGINT received. Shutting down...');
        await terminate(EXIT_SUCCESS);
    });

    //
    // Uncaught exceptions
    //
    process.on('uncaughtException', async (err: Error) => {
        log.exception('Uncaught exception.', err);
        await terminate(EXIT_UNCAUGHT_EXCEPTION);
    });

    //
    // Unhandled promise rejections
    //
    process.on('unhandledRejection', async (reason: unknown) => {
        log.exception('Unhandled promise rejection.', toError(reason));
        await terminate(EXIT_UNHANDLED_REJECTION);
    });

    //
    // Exit event (called for all exits)
    //
    process.on('exit', (code: number) => {
        log.verbose(`Process exiting with code: ${code}`);
        // Only synchronous operations will work here.
    });

    terminationHandlersInitialized = true;
}
