import { IsEthereumAddress, IsNotEmpty, IsString } from 'class-validator';

/**
 * Body of `POST /auth/challenge`.
 */
export class ChallengeRequestDto {
  @IsEthereumAddress({ message: 'address must be an Ethereum address' })
  address!: string;
}

/**
 * Body of `POST /auth/verify`: the exact challenge text and the wallet's
 * personal-message signature over it.
 */
export class VerifyRequestDto {
  @IsString()
  @IsNotEmpty()
  message!: string;

  @IsString()
  @IsNotEmpty()
  signature!: string;
}
