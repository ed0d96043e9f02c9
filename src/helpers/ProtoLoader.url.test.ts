import {http, HttpResponse} from 'msw';
import {setupServer} from 'msw/node';
import ProtoLoader from './ProtoLoader';
import NetworkError from '../utils/custom-errors/NetworkError';

const usersProto = `
syntax = "proto3";

package users;

import "types.proto";

service Users {
  // POST /users [Users]
  rpc CreateUser(User) returns (User);
}
`;

const typesProto = `
syntax = "proto3";

package users;

message User {
  int64 id = 1;
  string name = 2;
}
`;

const server = setupServer(
  http.get('https://protos.example.com/users.proto', () => HttpResponse.text(usersProto)),
  http.get('https://protos.example.com/types.proto', () => HttpResponse.text(typesProto)),
  http.get('https://protos.example.com/missing.proto', () => new HttpResponse(null, {status: 404})),
  http.get('https://protos.error.com/users.proto', () => HttpResponse.error())
);

beforeAll(() => server.listen());
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

describe('ProtoLoader.load from URLs', () => {
  it('should load a proto file and its relative imports', async () => {
    const descriptors = await ProtoLoader.load(['https://protos.example.com/users.proto']);

    expect(descriptors.services[0].methods[0]).toMatchObject({name: 'CreateUser', inputType: 'users.User'});
    expect(descriptors.messages.get('users.User')?.fields.map((item) => item.name)).toEqual(['id', 'name']);
  });

  it('should report failed downloads', async () => {
    await expect(ProtoLoader.load(['https://protos.example.com/missing.proto'])).rejects.toThrow(NetworkError);
    await expect(ProtoLoader.load(['https://protos.error.com/users.proto'])).rejects.toThrow(NetworkError);
  });
});
