import { inOrder } from "bst";
import {
    MENU_CHOICES,
    createMenuSession,
    executeMenuOption,
    getKeyPrompt,
    isMenuOption,
    IMenuSession,
} from "../../lib/menu";

//
// Builds a session whose tree holds the keys, inserted in order.
//
function sessionWith(keys: number[]): IMenuSession {
    const session = createMenuSession();
    for (const key of keys) {
        executeMenuOption(session, "insert", key);
    }
    return session;
}

describe("menu", () => {

    test("offers every option, ending with quit", () => {
        expect(MENU_CHOICES.map(choice => choice.value)).toEqual([
            "insert", "delete", "find", "height", "in-order", "print", "quit",
        ]);
    });

    test("recognizes menu options", () => {
        expect(isMenuOption("find")).toBe(true);
        expect(isMenuOption("purge")).toBe(false);
        expect(isMenuOption(3)).toBe(false);
    });

    describe("getKeyPrompt", () => {
        test("asks for a key for insert and find", () => {
            const session = createMenuSession();
            expect(getKeyPrompt(session, "insert")).toBe("Enter the new node's value:");
            expect(getKeyPrompt(session, "find")).toBe("Enter the searched value:");
        });

        test("asks for a key for delete only when the tree has keys", () => {
            expect(getKeyPrompt(createMenuSession(), "delete")).toBeUndefined();
            expect(getKeyPrompt(sessionWith([1]), "delete")).toBe("Enter the value to be removed:");
        });

        test("doesn't ask for a key for the other options", () => {
            const session = sessionWith([1]);
            for (const option of ["height", "in-order", "print", "quit"] as const) {
                expect(getKeyPrompt(session, option)).toBeUndefined();
            }
        });
    });

    describe("executeMenuOption", () => {
        test("inserts a key", () => {
            const session = createMenuSession();
            expect(executeMenuOption(session, "insert", 5)).toEqual({ lines: ["Inserted 5."], quit: false });
            expect(Array.from(inOrder(session.tree))).toEqual([5]);
        });

        test("reports a key that is already present", () => {
            const session = sessionWith([5]);
            expect(executeMenuOption(session, "insert", 5)).toEqual({ lines: ["5 is already in the tree."], quit: false });
            expect(Array.from(inOrder(session.tree))).toEqual([5]);
        });

        test("deletes a key", () => {
            const session = sessionWith([5, 3, 8, 1, 4]);
            expect(executeMenuOption(session, "delete", 5)).toEqual({ lines: ["Removed 5."], quit: false });
            expect(session.tree.root?.key).toBe(4);
            expect(Array.from(inOrder(session.tree))).toEqual([1, 3, 4, 8]);
        });

        test("reports a key that can't be deleted because it's absent", () => {
            const session = sessionWith([5]);
            expect(executeMenuOption(session, "delete", 9)).toEqual({ lines: ["9 is not in the tree."], quit: false });
        });

        test("reports deleting from an empty tree without needing a key", () => {
            expect(executeMenuOption(createMenuSession(), "delete")).toEqual({ lines: ["Tree is already empty!"], quit: false });
        });

        test("finds keys", () => {
            const session = sessionWith([5, 3, 8, 1, 4]);
            expect(executeMenuOption(session, "find", 4).lines).toEqual(["The value is in the tree."]);
            expect(executeMenuOption(session, "find", 9).lines).toEqual(["The value is not in the tree."]);
        });

        test("reports the height", () => {
            expect(executeMenuOption(sessionWith([5, 3, 8, 1, 4]), "height").lines).toEqual(["Current height of the tree is: 3"]);
            expect(executeMenuOption(createMenuSession(), "height").lines).toEqual(["Current height of the tree is: 0"]);
        });

        test("lists the keys in order", () => {
            expect(executeMenuOption(sessionWith([5, 3, 8, 1, 4]), "in-order").lines).toEqual(["[ 1 ]  [ 3 ]  [ 4 ]  [ 5 ]  [ 8 ]"]);
            expect(executeMenuOption(createMenuSession(), "in-order").lines).toEqual(["Tree is empty!"]);
        });

        test("prints the tree rotated", () => {
            expect(executeMenuOption(sessionWith([5, 3, 8]), "print").lines).toEqual([
                "          8",
                "5",
                "          3",
            ]);
            expect(executeMenuOption(createMenuSession(), "print").lines).toEqual(["Tree is empty!"]);
        });

        test("quits", () => {
            expect(executeMenuOption(createMenuSession(), "quit")).toEqual({ lines: [], quit: true });
        });

        test("throws when an option that needs a key doesn't get one", () => {
            expect(() => executeMenuOption(createMenuSession(), "insert")).toThrow('Menu option "insert" needs a key.');
            expect(() => executeMenuOption(sessionWith([1]), "delete")).toThrow('Menu option "delete" needs a key.');
        });
    });
});
