import { gzipSync } from 'zlib';
import * as tar from 'tar-stream';
import * as yazl from 'yazl';

/** Archive member for test fixtures; a trailing `/` marks a directory. */
export type FixtureMember = string | { path: string; content: string };

function memberOf(member: FixtureMember): { path: string; content: string } {
  return typeof member === 'string' ? { path: member, content: '' } : member;
}

async function drain(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

export async function buildZip(
  members: FixtureMember[],
  options: { compress?: boolean } = {},
): Promise<Buffer> {
  const zip = new yazl.ZipFile();
  for (const member of members.map(memberOf)) {
    if (member.path.endsWith('/')) {
      zip.addEmptyDirectory(member.path);
    } else {
      zip.addBuffer(Buffer.from(member.content), member.path, {
        compress: options.compress ?? true,
      });
    }
  }
  zip.end();
  return drain(zip.outputStream);
}

export async function buildTarGz(members: FixtureMember[]): Promise<Buffer> {
  const pack = tar.pack();
  for (const member of members.map(memberOf)) {
    if (member.path.endsWith('/')) {
      pack.entry({ name: member.path, type: 'directory' });
    } else {
      pack.entry({ name: member.path }, member.content);
    }
  }
  pack.finalize();
  return gzipSync(await drain(pack));
}
