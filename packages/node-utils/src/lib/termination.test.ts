import { log } from "utils";
import { exit, invokeTerminationCallbacks, registerTerminationCallback } from "./termination";
import { EXIT_TERMINATION_CALLBACKS_THREW } from "./exit-codes";

jest.mock("utils", () => ({
    log: {
        exception: jest.fn(),
        verbose: jest.fn(),
    },
}));

describe("termination", () => {
    beforeEach(() => {
        jest.clearAllMocks();

        // Keep the handlers off the test runner's process.
        jest.spyOn(process, "on").mockReturnValue(process);
        jest.spyOn(process, "exit").mockImplementation(code => {
            throw new Error(`exit ${code}`);
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("invokes registered callbacks in order with the exit code", async () => {
        const calls: string[] = [];
        registerTerminationCallback(code => {
            calls.push(`first ${code}`);
        });
        registerTerminationCallback(async code => {
            calls.push(`second ${code}`);
        });

        await invokeTerminationCallbacks(3);

        expect(calls).toEqual(["first 3", "second 3"]);
    });

    test("invokes each callback only once", async () => {
        const callback = jest.fn();
        registerTerminationCallback(callback);

        await invokeTerminationCallbacks(0);
        await invokeTerminationCallbacks(0);

        expect(callback).toHaveBeenCalledTimes(1);
    });

    test("exit runs the callbacks and then exits with the code", async () => {
        const callback = jest.fn();
        registerTerminationCallback(callback);

        await expect(exit(0)).rejects.toThrow("exit 0");

        expect(callback).toHaveBeenCalledWith(0);
        expect(process.exit).toHaveBeenCalledWith(0);
    });

    test("exit reports a callback that throws", async () => {
        const error = new Error("Cleanup failed");
        registerTerminationCallback(() => {
            throw error;
        });

        await expect(exit(0)).rejects.toThrow(`exit ${EXIT_TERMINATION_CALLBACKS_THREW}`);

        expect(log.exception).toHaveBeenCalledWith("Error during exit termination callbacks.", error);
    });
});
