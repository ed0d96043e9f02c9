export const HTTP_METHODS = ['GET', 'PUT', 'POST', 'DELETE'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

export type AnnotationRecord = Readonly<{
    method: HttpMethod;
    rawPath: string;
    omitBody: boolean;
    tags: readonly string[];
    line: string;
}>;

export type PathParameterType = 'string' | 'int';

export type PathParameter = {
    name: string;
    type: PathParameterType;
}

export type CompiledPath = {
    template: string;
    parameters: PathParameter[];
}

// Descriptor model handed over by the proto loader

export type FieldKind = 'scalar' | 'message' | 'enum';

export type FieldDescriptor = {
    name: string;
    /** Scalar type name, or the fully-qualified message/enum name */
    type: string;
    kind: FieldKind;
    repeated: boolean;
    required: boolean;
    mapKeyType?: string;
    oneof?: string;
}

export type MessageDescriptor = {
    fullName: string;
    name: string;
    fields: FieldDescriptor[];
    comment?: string;
}

export type EnumValue = {
    name: string;
    number: number;
}

export type EnumDescriptor = {
    fullName: string;
    name: string;
    values: EnumValue[];
    comment?: string;
}

export type MethodDescriptor = {
    name: string;
    comment?: string;
    inputType: string;
    outputType: string;
}

export type ServiceDescriptor = {
    name: string;
    fullName: string;
    methods: MethodDescriptor[];
}

export type ProtoDescriptorSet = {
    packageName: string;
    services: ServiceDescriptor[];
    messages: Map<string, MessageDescriptor>;
    enums: Map<string, EnumDescriptor>;
}

// Schema model

export type PrimitiveType = 'string' | 'integer' | 'number' | 'boolean';

export type SchemaNode =
    | { kind: 'object'; properties: Array<[string, SchemaNode]>; required: string[]; description?: string }
    | { kind: 'array'; items: SchemaNode }
    | { kind: 'map'; values: SchemaNode }
    | { kind: 'primitive'; type: PrimitiveType; format?: string }
    | { kind: 'enum'; values: EnumValue[]; description?: string }
    | { kind: 'oneOf'; variants: Array<[string, SchemaNode]> }
    | { kind: 'reference'; name: string };

export type RegistryEntry =
    | { state: 'in-progress' }
    | { state: 'complete'; node: SchemaNode };

// OpenAPI document

export type OpenAPISchema = {
    type?: 'object' | 'array' | PrimitiveType;
    format?: string;
    description?: string;
    properties?: Record<string, OpenAPISchema>;
    required?: string[];
    additionalProperties?: OpenAPISchema;
    items?: OpenAPISchema;
    enum?: number[];
    oneOf?: OpenAPISchema[];
    $ref?: string;
}

export type OpenAPIParameter = {
    name: string;
    in: 'path';
    required: true;
    schema: OpenAPISchema;
}

export type OpenAPIMediaContent = {
    'application/json': {
        schema: OpenAPISchema;
    };
}

export type OpenAPIRequestBody = {
    required: boolean;
    content: OpenAPIMediaContent;
}

export type OpenAPIResponse = {
    description: string;
    content: OpenAPIMediaContent;
}

export type OpenAPIOperation = {
    operationId: string;
    summary?: string;
    tags: string[];
    parameters: OpenAPIParameter[];
    requestBody?: OpenAPIRequestBody;
    responses: Record<string, OpenAPIResponse>;
}

export type OpenAPIPathItem = Partial<Record<Lowercase<HttpMethod>, OpenAPIOperation>>;

export type OpenAPIInfo = {
    title: string;
    version: string;
}

export type OpenAPIDocument = {
    openapi: string;
    info: OpenAPIInfo;
    paths: Record<string, OpenAPIPathItem>;
    components: {
        schemas: Record<string, OpenAPISchema>;
    };
}

export type GeneratorOptions = {
    protoInputs: string[];
    outputPath: string;
    title: string;
    version: string;
}
