/**
 * Shared Error Factory for cave domain errors.
 *
 * All functions are pure and return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.caveNotLoaded(name);
 * Stateful classes throw `new Error(errors.x(...).content[0].text)` instead.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The client reads the text and can self-correct.
 */
export type DomainErrorResponse = {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
};

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

/**
 * Extracts the message of a caught value, for handlers that turn thrown
 * domain errors back into responses.
 */
export function messageOf(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

// ----------------------------------------------------------------------------
// project
// ----------------------------------------------------------------------------

export function noProjectLoaded(): DomainErrorResponse {
    return domainError('No project loaded. Call project init or project open first.');
}

export function projectFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Project file not found: ${path}`);
}

export function invalidProjectFile(path: string, detail: string): DomainErrorResponse {
    return domainError(`Invalid project file: ${path}. ${detail}`);
}

// ----------------------------------------------------------------------------
// cave
// ----------------------------------------------------------------------------

export function caveNotInRegistry(name: string): DomainErrorResponse {
    return domainError(`Cave '${name}' not found in project registry.`);
}

export function caveAlreadyExists(name: string): DomainErrorResponse {
    return domainError(`Cave '${name}' already exists in the project registry.`);
}

export function caveFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Cave file not found: ${path}`);
}

export function caveNotLoaded(name: string): DomainErrorResponse {
    return domainError(`Cave '${name}' is not loaded in the workspace.`);
}

export function invalidCaveSize(width: number, height: number): DomainErrorResponse {
    return domainError(`Cave size ${String(width)}x${String(height)} is invalid. Width and height must be integers in 1-1000.`);
}

// ----------------------------------------------------------------------------
// object
// ----------------------------------------------------------------------------

export function objectIndexOutOfRange(index: number, name: string, count: number): DomainErrorResponse {
    return domainError(`Object ${String(index)} is out of range. Cave '${name}' has ${String(count)} object(s).`);
}

export function unknownObjectType(type: string): DomainErrorResponse {
    return domainError(`Unknown object type '${type}'. Use object kinds to list the available types.`);
}

export function unparseableObjectLine(line: string): DomainErrorResponse {
    return domainError(`Cannot parse object line: ${line}`);
}

export function unknownField(tag: string, field: string): DomainErrorResponse {
    return domainError(`${tag} has no field '${field}'.`);
}

export function missingField(tag: string, field: string): DomainErrorResponse {
    return domainError(`${tag} requires a value for field '${field}'.`);
}

export function invalidFieldValue(tag: string, field: string, expected: string): DomainErrorResponse {
    return domainError(`Invalid value for ${tag} field '${field}'. Expected ${expected}.`);
}

// ----------------------------------------------------------------------------
// history
// ----------------------------------------------------------------------------

export function nothingToUndo(): DomainErrorResponse {
    return domainError('Nothing to undo.');
}

export function nothingToRedo(): DomainErrorResponse {
    return domainError('Nothing to redo.');
}
