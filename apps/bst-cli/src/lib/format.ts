//
// Formats keys as the cells of a row, e.g. `[ 1 ]  [ 3 ]  [ 4 ]`.
//
export function formatKeys(keys: Iterable<number>): string {
    const cells = Array.from(keys, key => `[ ${key} ]`);
    if (cells.length === 0) {
        return "Tree is empty!";
    }

    return cells.join("  ");
}
