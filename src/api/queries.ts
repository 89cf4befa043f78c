/**
 * GraphQL operations consumed from the platform API
 */

export type GraphqlOperation<V> = {
  operationName: string;
  variables: V;
  query: string;
};

export type LoginVariables = {
  input: { username: string; password: string };
};

export type VideoForWatchAuthVariables = {
  id: string;
  isStandalone: boolean;
};

export const LOGIN_MUTATION = `
mutation Login($input: LoginInput!) {
  login(input: $input) {
    token
    user {
      id
      name
      username
      email
    }
    errors {
      key
      message
    }
  }
}
`;

export const VIDEO_FOR_WATCH_AUTH_QUERY = `
query GetVideoForWatchAuth($id: ID!, $isStandalone: Boolean) {
  result: getVideoForWatchAuth(id: $id, isStandalone: $isStandalone) {
    video {
      ...VideoForWatchAuthData
      __typename
    }
    isAuthorized
    errors {
      ...ErrorsFields
      __typename
    }
    __typename
  }
}

fragment VideoForWatchAuthData on Video {
  id
  videoRef
  token
  __typename
}

fragment ErrorsFields on ErrorOutput {
  key
  message
  __typename
}
`;

export function loginOperation(username: string, password: string): GraphqlOperation<LoginVariables> {
  return {
    operationName: 'Login',
    variables: { input: { username, password } },
    query: LOGIN_MUTATION,
  };
}

export function videoForWatchAuthOperation(videoId: string): GraphqlOperation<VideoForWatchAuthVariables> {
  return {
    operationName: 'GetVideoForWatchAuth',
    variables: { id: videoId, isStandalone: false },
    query: VIDEO_FOR_WATCH_AUTH_QUERY,
  };
}
