/**
 * Actor components: keyed blobs that follow an actor's object data.
 *
 * Variable-list components (`GlobalVariables`, `PersistenceKeys`, ...) hold typed name/value
 * pairs; any other key holds a property bag. Both forms end with a reserved u64 that must be 0.
 */

import { InvalidFormatError, LengthMismatchError, TypeMismatchError } from '../errors.js';
import { formatPath, withSegment, type ReadContext, type WriteContext } from '../properties/context.js';
import { VARIABLE_COMPONENT_KEYS, type Component, type Variable, type VariableValue } from './model.js';

const enum VariableKind {
    None = 0,
    Bool = 1,
    Int = 2,
    Float = 3,
    Name = 4,
}

function readReserved(ctx: ReadContext, what: string): void {
    const at = ctx.reader.position;
    const reserved = ctx.reader.readUint64();
    if (reserved !== 0n) {
        throw new InvalidFormatError(`${what} reserved field is 0x${reserved.toString(16)}, expected 0`, { offset: at });
    }
}

function readVariable(ctx: ReadContext): Variable {
    const { reader: r, names } = ctx;
    const name = names.readName(r);
    const at = r.position;
    const kind = r.readUint8();
    let value: VariableValue;
    switch (kind) {
        case VariableKind.None: value = { type: 'none' }; break;
        case VariableKind.Bool: value = { type: 'bool', value: r.readBool32() }; break;
        case VariableKind.Int: value = { type: 'int', value: r.readInt32() }; break;
        case VariableKind.Float: value = { type: 'float', value: r.readFloat32() }; break;
        case VariableKind.Name: value = { type: 'name', value: names.readName(r) }; break;
        default:
            throw new InvalidFormatError(`Unknown variable kind ${kind}`, { offset: at });
    }
    return { name, value };
}

function readComponentBody(ctx: ReadContext, key: string): Component {
    if (VARIABLE_COMPONENT_KEYS.has(key)) {
        const name = ctx.names.readName(ctx.reader);
        readReserved(ctx, 'Variables');
        const count = ctx.reader.readUint32();
        const variables: Variable[] = [];
        for (let i = 0; i < count; i++) variables.push(withSegment(ctx, `[${i}]`, () => readVariable(ctx)));
        return { key, type: 'variables', name, variables };
    }
    const properties = ctx.readProperties();
    readReserved(ctx, 'Component');
    return { key, type: 'properties', properties };
}

export function readComponents(ctx: ReadContext): Component[] {
    const r = ctx.reader;
    const count = r.readUint32();
    const components: Component[] = [];
    for (let i = 0; i < count; i++) {
        const key = r.readFString();
        const length = r.readUint32();
        const start = r.position;
        const component = withSegment(ctx, key, () => readComponentBody(ctx, key));
        if (r.position - start !== length) {
            throw new LengthMismatchError(
                `Component ${key} declares ${length} bytes but ${r.position - start} were read`,
                length,
                r.position - start,
                { offset: start, path: formatPath([...ctx.path, key]) },
            );
        }
        components.push(component);
    }
    return components;
}

function writeVariable(ctx: WriteContext, variable: Variable): void {
    const { writer: w, names } = ctx;
    names.writeName(w, variable.name);
    const v = variable.value;
    switch (v.type) {
        case 'none':
            w.writeUint8(VariableKind.None);
            return;
        case 'bool':
            w.writeUint8(VariableKind.Bool);
            w.writeUint32(v.value ? 1 : 0);
            return;
        case 'int':
            if (!Number.isInteger(v.value) || v.value < -0x80000000 || v.value > 0x7FFFFFFF) {
                throw new TypeMismatchError(`${v.value} does not fit an int variable`, { path: formatPath(ctx.path) });
            }
            w.writeUint8(VariableKind.Int);
            w.writeInt32(v.value);
            return;
        case 'float':
            w.writeUint8(VariableKind.Float);
            w.writeFloat32(v.value);
            return;
        case 'name':
            w.writeUint8(VariableKind.Name);
            names.writeName(w, v.value);
            return;
    }
}

function writeComponentBody(ctx: WriteContext, component: Component): void {
    const isVariables = VARIABLE_COMPONENT_KEYS.has(component.key);
    if (isVariables !== (component.type === 'variables')) {
        throw new TypeMismatchError(`Component ${component.key} cannot hold ${component.type}`, {
            path: formatPath(ctx.path),
        });
    }
    const w = ctx.writer;
    if (component.type === 'variables') {
        ctx.names.writeName(w, component.name);
        w.writeBigUint64(0n);
        w.writeUint32(component.variables.length);
        component.variables.forEach((v, i) => withSegment(ctx, `[${i}]`, () => writeVariable(ctx, v)));
        return;
    }
    ctx.writeProperties(component.properties);
    w.writeBigUint64(0n);
}

export function writeComponents(ctx: WriteContext, components: readonly Component[]): void {
    const w = ctx.writer;
    w.writeUint32(components.length);
    for (const component of components) {
        w.writeFString(component.key);
        const lengthAt = w.length;
        w.writeUint32(0);
        const start = w.length;
        withSegment(ctx, component.key, () => writeComponentBody(ctx, component));
        w.setUint32At(lengthAt, w.length - start);
    }
}
